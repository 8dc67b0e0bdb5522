import { decodeJwt } from 'jose';
import { z } from 'zod';
import { RlsRefreshError, errorMessage } from '../errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('rls');

export const DEFAULT_REFRESH_THRESHOLD_SECONDS = 300;
const REFRESH_TIMEOUT_MS = 10000;

const RefreshResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().optional(),
});

export interface TokenPair {
  accessToken: string;
  refreshToken: string | null;
}

/**
 * True when the token expires within `thresholdSeconds`, has no `exp`
 * claim, or cannot be decoded at all.
 */
export function isTokenExpiring(
  accessToken: string,
  thresholdSeconds: number = DEFAULT_REFRESH_THRESHOLD_SECONDS,
  nowMs: number = Date.now()
): boolean {
  let exp: number | undefined;
  try {
    exp = decodeJwt(accessToken).exp;
  } catch (error) {
    log.warn('Failed to parse RLS access token', { error: errorMessage(error) });
    return true;
  }
  if (exp === undefined) {
    log.warn('Access token missing exp claim');
    return true;
  }
  return exp - nowMs / 1000 < thresholdSeconds;
}

export interface RlsTokenManagerOptions {
  supabaseUrl: string;
  anonKey: string;
  refreshThresholdSeconds?: number;
  fetchImpl?: typeof fetch;
  now?: () => number;
}

/**
 * Keeps a Supabase access token fresh for the length of an analysis run.
 */
export class RlsTokenManager {
  private readonly supabaseUrl: string;
  private readonly anonKey: string;
  readonly refreshThresholdSeconds: number;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => number;

  constructor(options: RlsTokenManagerOptions) {
    this.supabaseUrl = options.supabaseUrl.replace(/\/+$/, '');
    this.anonKey = options.anonKey;
    this.refreshThresholdSeconds = options.refreshThresholdSeconds ?? DEFAULT_REFRESH_THRESHOLD_SECONDS;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.now = options.now ?? Date.now;
  }

  isTokenExpired(accessToken: string): boolean {
    return isTokenExpiring(accessToken, this.refreshThresholdSeconds, this.now());
  }

  /**
   * Returns the pair unchanged while the access token is fresh, otherwise
   * exchanges the refresh token for a new pair.
   *
   * @throws RlsRefreshError when no refresh token is available or the
   * exchange fails
   */
  async refreshTokenIfNeeded(accessToken: string, refreshToken: string | null): Promise<TokenPair> {
    if (!accessToken) {
      throw new RlsRefreshError('Access token required for refresh check');
    }
    if (!this.isTokenExpired(accessToken)) {
      return { accessToken, refreshToken };
    }
    if (!refreshToken) {
      throw new RlsRefreshError('Access token expired and no refresh token provided');
    }

    const endpoint = `${this.supabaseUrl}/auth/v1/token?grant_type=refresh_token`;
    let response: Response;
    try {
      response = await this.fetchImpl(endpoint, {
        method: 'POST',
        headers: {
          apikey: this.anonKey,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({ refresh_token: refreshToken }),
        signal: AbortSignal.timeout(REFRESH_TIMEOUT_MS),
      });
    } catch (error) {
      throw new RlsRefreshError(`Token refresh request failed: ${errorMessage(error)}`, { cause: error });
    }

    const body = await response.text();
    if (response.status !== 200) {
      log.error('Token refresh failed', { status: response.status, detail: body.slice(0, 200) });
      throw new RlsRefreshError(`Token refresh failed with status ${response.status}: ${body.slice(0, 200)}`);
    }

    let data: unknown;
    try {
      data = JSON.parse(body);
    } catch (error) {
      throw new RlsRefreshError('Token refresh response was not JSON', { cause: error });
    }

    const parsed = RefreshResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new RlsRefreshError('Token refresh response missing access_token');
    }

    log.info('Access token refreshed');
    return {
      accessToken: parsed.data.access_token,
      refreshToken: parsed.data.refresh_token ?? refreshToken,
    };
  }
}
