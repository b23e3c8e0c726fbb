import { rejected, type AuthResult, type Authenticator } from './types.js';

/**
 * Routes a credential to the authenticator registered for its scheme name.
 */
export class AuthenticatorDispatcher {
  private readonly authenticators = new Map<string, Authenticator>();

  register(scheme: string, authenticator: Authenticator): this {
    if (this.authenticators.has(scheme)) {
      throw new Error(`authenticator already registered for scheme: ${scheme}`);
    }
    this.authenticators.set(scheme, authenticator);
    return this;
  }

  async authenticate(scheme: string, credential: string): Promise<AuthResult> {
    const authenticator = this.authenticators.get(scheme);
    if (!authenticator) {
      return rejected(`unsupported scheme: ${scheme}`);
    }
    return authenticator.authenticate(credential);
  }

  schemes(): readonly string[] {
    return Array.from(this.authenticators.keys());
  }
}
