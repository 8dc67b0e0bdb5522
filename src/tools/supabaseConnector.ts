import { decodeJwt, type JWTPayload } from 'jose';
import type { ResultSet, RlsContext } from '../types.js';
import { PostgresConnector, type PostgresConnectorOptions } from './postgresConnector.js';
import { ensureLimit } from '../agent/guard.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('supabase');

function decodeClaims(accessToken: string): JWTPayload {
  try {
    return decodeJwt(accessToken);
  } catch (error) {
    log.warn('Could not decode access token claims', {
      error: error instanceof Error ? error.message : String(error),
    });
    return {};
  }
}

/**
 * Supabase Postgres connector. Adds an RLS-aware execution path that runs
 * the statement as the `authenticated` role with the caller's JWT claims
 * applied for the duration of one transaction.
 */
export class SupabaseConnector extends PostgresConnector {
  readonly kind: string = 'supabase';

  constructor(options: PostgresConnectorOptions) {
    super({ ...options, name: options.name ?? 'supabase' });
  }

  async runSqlWithRls(sql: string, limit: number | undefined, rls: RlsContext): Promise<ResultSet> {
    const statement = limit !== undefined ? ensureLimit(sql, this.dialect, limit) : sql;
    const claims = decodeClaims(rls.accessToken);
    const role = typeof claims.role === 'string' ? claims.role : null;

    return this.withClient(async client => {
      await client.query('BEGIN');
      try {
        await client.query('SET LOCAL ROLE authenticated');
        await client.query("SELECT set_config('request.jwt.claims', $1, true)", [JSON.stringify(claims)]);
        await client.query("SELECT set_config('request.jwt.claim.sub', $1, true)", [claims.sub ?? '']);
        await client.query("SELECT set_config('request.jwt.claim.role', $1, true)", [role ?? '']);

        const result = await this.queryArray(client, statement);
        await client.query('COMMIT');
        return result;
      } catch (error) {
        try {
          await client.query('ROLLBACK');
        } catch (rollbackError) {
          log.error('Rollback failed', {
            error: rollbackError instanceof Error ? rollbackError.message : String(rollbackError),
          });
        }
        throw error;
      }
    });
  }
}
