import type { Connector } from './connector.js';
import { PostgresConnector } from './postgresConnector.js';
import { SupabaseConnector } from './supabaseConnector.js';

export interface ConnectorOptions {
  connectionString: string;
  schema?: string;
  statementTimeoutMs?: number;
}

export type ConnectorFactory = (options: ConnectorOptions) => Connector;

const factories = new Map<string, ConnectorFactory>();

export function registerConnector(kind: string, factory: ConnectorFactory): void {
  factories.set(kind.toLowerCase(), factory);
}

export function makeConnector(kind: string, options: ConnectorOptions): Connector {
  const factory = factories.get(kind.toLowerCase());
  if (!factory) {
    const available = listAvailableConnectors().join(', ');
    throw new Error(`Unknown connector kind: ${kind}. Available: ${available}`);
  }
  return factory(options);
}

export function listAvailableConnectors(): string[] {
  return Array.from(factories.keys()).sort();
}

registerConnector('postgres', options => new PostgresConnector(options));
registerConnector('postgresql', options => new PostgresConnector(options));
registerConnector('supabase', options => new SupabaseConnector(options));
