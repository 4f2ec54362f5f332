export { KeyedMutex } from './keyed-mutex';
export { delay, throwIfAborted, CancelledError } from './cancellation';
