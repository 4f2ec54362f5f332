/**
 * Auth Session
 *
 * Holds the bearer token of the signed-in user. Token issuance happens
 * elsewhere; this object only records whether there is one.
 */

export class AuthSession {
  private token: string | null;

  constructor(initialToken: string | null = null) {
    this.token = initialToken && initialToken.trim() !== '' ? initialToken.trim() : null;
  }

  isAuthenticated(): boolean {
    return this.token !== null;
  }

  getToken(): string | null {
    return this.token;
  }

  /**
   * @throws Error when the token is blank
   */
  setToken(token: string): void {
    const trimmed = token.trim();
    if (trimmed === '') {
      throw new Error('Token must not be empty');
    }
    this.token = trimmed;
  }

  clear(): void {
    this.token = null;
  }
}
