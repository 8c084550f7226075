import type { FitnessServicePort } from '../../ports/FitnessServicePort.js';
import { createLogger } from '../../utils/logger.js';
import { AuthenticationError, ConfigurationError, errorMessage } from '../../utils/errors.js';

export interface SessionManagerOptions {
  email?: string;
  password?: string;
  /** Directory the session tokens are written to after login. */
  tokenDir: string;
}

const MISSING_CREDENTIALS_MESSAGE = [
  'Garmin credentials not found. Please set environment variables:',
  "export GARMIN_EMAIL='your_email@example.com'",
  "export GARMIN_PASSWORD='your_password'",
  'Or create a .env file with these variables.',
].join('\n');

/**
 * Owns the authenticated session for the lifetime of the process. The session
 * is created on first use; concurrent first callers share one login.
 */
export class SessionManager<TSession> {
  private readonly logger = createLogger({ component: 'SessionManager' });
  private session: TSession | null = null;
  private pending: Promise<TSession> | null = null;

  constructor(
    private readonly service: FitnessServicePort<TSession>,
    private readonly options: SessionManagerOptions
  ) {}

  get isAuthenticated(): boolean {
    return this.session !== null;
  }

  async getSession(): Promise<TSession> {
    if (this.session !== null) {
      return this.session;
    }
    if (!this.pending) {
      this.pending = this.establish().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  private async establish(): Promise<TSession> {
    const { email, password, tokenDir } = this.options;
    if (!email || !password) {
      throw new ConfigurationError(MISSING_CREDENTIALS_MESSAGE);
    }

    let session: TSession;
    try {
      session = await this.service.authenticate({ email, password });
    } catch (error) {
      this.logger.error({ error }, 'Authentication with Garmin Connect failed');
      if (error instanceof AuthenticationError) throw error;
      throw new AuthenticationError(`Garmin Connect login failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    try {
      await this.service.persistSession(session, tokenDir);
    } catch (error) {
      this.logger.warn({ error, tokenDir }, 'Could not persist session tokens');
    }

    this.session = session;
    this.logger.info('Session established');
    return session;
  }
}
