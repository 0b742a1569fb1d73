import { AuthRequiredError } from './errors.js';

/**
 * Per-client session state. Initialisation (anti-forgery token plus cookies) runs
 * at most once; concurrent callers share the in-flight fetch.
 */
export class Session {
  accessToken?: string;
  private xsrfToken?: string;
  private pending?: Promise<void>;
  private readonly cookies = new Map<string, string>();

  get initialized(): boolean {
    return this.xsrfToken !== undefined;
  }

  get antiForgeryToken(): string | undefined {
    return this.xsrfToken;
  }

  async ensureInitialized(fetchToken: () => Promise<string>): Promise<void> {
    if (this.initialized) {
      return;
    }
    if (!this.pending) {
      this.pending = fetchToken()
        .then((token) => {
          this.xsrfToken = token;
        })
        .finally(() => {
          this.pending = undefined;
        });
    }
    await this.pending;
  }

  requireAccessToken(action: string): string {
    if (!this.accessToken) {
      throw new AuthRequiredError(action);
    }
    return this.accessToken;
  }

  rememberCookies(setCookie: readonly string[] | undefined): void {
    for (const header of setCookie ?? []) {
      const pair = header.split(';', 1)[0] ?? '';
      const separator = pair.indexOf('=');
      if (separator <= 0) {
        continue;
      }
      this.cookies.set(pair.slice(0, separator).trim(), pair.slice(separator + 1).trim());
    }
  }

  cookieHeader(): string | undefined {
    if (this.cookies.size === 0) {
      return undefined;
    }
    return Array.from(this.cookies, ([name, value]) => `${name}=${value}`).join('; ');
  }
}
