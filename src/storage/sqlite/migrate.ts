import type Database from 'better-sqlite3';

/**
 * Schema migrations, applied in order. PRAGMA user_version records how
 * many have run. Append new migrations; never edit an applied one.
 */
const MIGRATIONS: readonly string[] = [
  `
  CREATE TABLE auth_requests (
    id TEXT PRIMARY KEY NOT NULL,
    client_id TEXT NOT NULL,
    response_types TEXT NOT NULL,
    scopes TEXT NOT NULL,
    redirect_uri TEXT NOT NULL,
    nonce TEXT NOT NULL,
    state TEXT NOT NULL,
    force_approval_prompt INTEGER NOT NULL,
    logged_in INTEGER NOT NULL,
    claims TEXT,
    connector_id TEXT NOT NULL,
    connector_data BLOB,
    code_challenge TEXT NOT NULL,
    code_challenge_method TEXT NOT NULL,
    expiry INTEGER NOT NULL
  );
  CREATE INDEX auth_requests_expiry_idx ON auth_requests (expiry);

  CREATE TABLE auth_codes (
    id TEXT PRIMARY KEY NOT NULL,
    client_id TEXT NOT NULL,
    scopes TEXT NOT NULL,
    redirect_uri TEXT NOT NULL,
    nonce TEXT NOT NULL,
    claims TEXT NOT NULL,
    connector_id TEXT NOT NULL,
    connector_data BLOB,
    code_challenge TEXT NOT NULL,
    code_challenge_method TEXT NOT NULL,
    expiry INTEGER NOT NULL
  );
  CREATE INDEX auth_codes_expiry_idx ON auth_codes (expiry);

  CREATE TABLE refresh_tokens (
    id TEXT PRIMARY KEY NOT NULL,
    token TEXT NOT NULL,
    obsolete_token TEXT NOT NULL,
    created_at INTEGER NOT NULL,
    last_used INTEGER NOT NULL,
    client_id TEXT NOT NULL,
    connector_id TEXT NOT NULL,
    connector_data BLOB,
    claims TEXT NOT NULL,
    scopes TEXT NOT NULL,
    nonce TEXT NOT NULL
  );

  CREATE TABLE device_requests (
    user_code TEXT PRIMARY KEY NOT NULL,
    device_code TEXT NOT NULL,
    client_id TEXT NOT NULL,
    client_secret TEXT NOT NULL,
    scopes TEXT NOT NULL,
    expiry INTEGER NOT NULL
  );
  CREATE INDEX device_requests_expiry_idx ON device_requests (expiry);

  CREATE TABLE device_tokens (
    device_code TEXT PRIMARY KEY NOT NULL,
    status TEXT NOT NULL,
    token TEXT NOT NULL,
    expiry INTEGER NOT NULL,
    last_request_time INTEGER NOT NULL,
    poll_interval_seconds INTEGER NOT NULL,
    code_challenge TEXT NOT NULL,
    code_challenge_method TEXT NOT NULL
  );
  CREATE INDEX device_tokens_expiry_idx ON device_tokens (expiry);

  CREATE TABLE clients (
    id TEXT PRIMARY KEY NOT NULL,
    secret TEXT NOT NULL,
    redirect_uris TEXT NOT NULL,
    trusted_peers TEXT NOT NULL,
    public INTEGER NOT NULL,
    name TEXT NOT NULL,
    logo_url TEXT NOT NULL
  );

  CREATE TABLE connectors (
    id TEXT PRIMARY KEY NOT NULL,
    type TEXT NOT NULL,
    name TEXT NOT NULL,
    resource_version TEXT NOT NULL,
    config BLOB NOT NULL
  );

  CREATE TABLE passwords (
    email TEXT PRIMARY KEY NOT NULL,
    hash TEXT NOT NULL,
    username TEXT NOT NULL,
    user_id TEXT NOT NULL
  );

  CREATE TABLE offline_sessions (
    id TEXT PRIMARY KEY NOT NULL,
    user_id TEXT NOT NULL,
    conn_id TEXT NOT NULL,
    refresh TEXT NOT NULL,
    connector_data BLOB
  );

  CREATE TABLE keys (
    id TEXT PRIMARY KEY NOT NULL,
    signing_key TEXT,
    signing_key_pub TEXT,
    verification_keys TEXT NOT NULL,
    next_rotation INTEGER NOT NULL
  );
  `,
];

/**
 * Bring the database schema up to date
 */
export function migrate(sqlite: Database.Database): void {
  const current = sqlite.pragma('user_version', { simple: true });
  const applied = typeof current === 'number' ? current : 0;

  for (let version = applied; version < MIGRATIONS.length; version++) {
    const sql = MIGRATIONS[version];
    if (sql === undefined) {
      break;
    }

    sqlite.transaction(() => {
      sqlite.exec(sql);
      sqlite.pragma(`user_version = ${version + 1}`);
    })();
  }
}
