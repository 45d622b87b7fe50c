/**
 * UMA reference VASP: Database schema and typed wrapper for SQLite.
 *
 * Uses better-sqlite3 (synchronous) with WAL mode. Every method runs to
 * completion without yielding, which is what the nonce and key caches rely on
 * for atomicity.
 */

import BetterSqlite3 from "better-sqlite3";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface PublicKeyRow {
  vasp_domain: string;
  /** PubKeyResponse JSON */
  response: string;
  expiration_timestamp: number | null;
  fetched_at: string;
}

export interface PaymentRow {
  id: string;
  receiver: string;
  payer_identifier: string | null;
  sender_vasp_domain: string | null;
  /** Amount as the sender stated it, in `amount_unit` */
  amount: number;
  /** A currency code, or "MSAT" for millisatoshis */
  amount_unit: string;
  /** Currency the receiver is credited in */
  receiving_currency_code: string;
  encoded_invoice: string;
  uma_layout: string;
  created_at: string;
}

export interface UtxoCallbackRow {
  id: string;
  vasp_domain: string;
  transaction_status: string | null;
  /** JSON array of {utxo, amountMsats} */
  utxos: string;
  received_at: string;
}

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

export function initializeDatabase(dbPath: string): BetterSqlite3.Database {
  const db = new BetterSqlite3(dbPath);

  db.pragma("journal_mode = WAL");
  db.pragma("synchronous = NORMAL");

  db.exec(`
    CREATE TABLE IF NOT EXISTS nonces (
      nonce       TEXT PRIMARY KEY,
      timestamp   INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_nonces_timestamp ON nonces(timestamp);

    CREATE TABLE IF NOT EXISTS nonce_floor (
      id                      INTEGER PRIMARY KEY CHECK (id = 1),
      oldest_valid_timestamp  INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS public_keys (
      vasp_domain           TEXT PRIMARY KEY,
      response              TEXT NOT NULL,
      expiration_timestamp  INTEGER,
      fetched_at            TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS payments (
      id                  TEXT PRIMARY KEY,
      receiver            TEXT NOT NULL,
      payer_identifier    TEXT,
      sender_vasp_domain  TEXT,
      amount              INTEGER NOT NULL,
      amount_unit         TEXT NOT NULL,
      receiving_currency_code TEXT NOT NULL,
      encoded_invoice     TEXT NOT NULL,
      uma_layout          TEXT NOT NULL,
      created_at          TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_payments_receiver ON payments(receiver);

    CREATE TABLE IF NOT EXISTS utxo_callbacks (
      id                  TEXT PRIMARY KEY,
      vasp_domain         TEXT NOT NULL,
      transaction_status  TEXT,
      utxos               TEXT NOT NULL,
      received_at         TEXT NOT NULL
    );
  `);

  return db;
}

// ---------------------------------------------------------------------------
// Database wrapper class with typed methods
// ---------------------------------------------------------------------------

export class Database {
  private db: BetterSqlite3.Database;

  constructor(dbPath: string) {
    this.db = initializeDatabase(dbPath);
  }

  /** Run `fn` inside one SQLite transaction; a throw rolls it back. */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  close(): void {
    this.db.close();
  }

  // -----------------------------------------------------------------------
  // Nonces
  // -----------------------------------------------------------------------

  /** False when the nonce is already present. */
  insertNonce(nonce: string, timestamp: number): boolean {
    const stmt = this.db.prepare<[string, number]>(
      "INSERT OR IGNORE INTO nonces (nonce, timestamp) VALUES (?, ?)",
    );
    return stmt.run(nonce, timestamp).changes > 0;
  }

  deleteNoncesOlderThan(timestamp: number): number {
    const stmt = this.db.prepare<[number]>("DELETE FROM nonces WHERE timestamp < ?");
    return stmt.run(timestamp).changes;
  }

  getNonceCount(): number {
    const stmt = this.db.prepare<[], { count: number }>("SELECT COUNT(*) as count FROM nonces");
    return stmt.get()?.count ?? 0;
  }

  getNonceFloor(): number | undefined {
    const stmt = this.db.prepare<[], { oldest_valid_timestamp: number }>(
      "SELECT oldest_valid_timestamp FROM nonce_floor WHERE id = 1",
    );
    return stmt.get()?.oldest_valid_timestamp;
  }

  setNonceFloor(timestamp: number): void {
    const stmt = this.db.prepare<[number]>(`
      INSERT INTO nonce_floor (id, oldest_valid_timestamp) VALUES (1, ?)
      ON CONFLICT(id) DO UPDATE SET oldest_valid_timestamp = excluded.oldest_valid_timestamp
    `);
    stmt.run(timestamp);
  }

  // -----------------------------------------------------------------------
  // Counterparty public keys
  // -----------------------------------------------------------------------

  getPublicKeys(vaspDomain: string): PublicKeyRow | undefined {
    const stmt = this.db.prepare<[string], PublicKeyRow>(
      "SELECT * FROM public_keys WHERE vasp_domain = ?",
    );
    return stmt.get(vaspDomain);
  }

  upsertPublicKeys(row: Omit<PublicKeyRow, "fetched_at">): void {
    const stmt = this.db.prepare<PublicKeyRow>(`
      INSERT INTO public_keys (vasp_domain, response, expiration_timestamp, fetched_at)
      VALUES (@vasp_domain, @response, @expiration_timestamp, @fetched_at)
      ON CONFLICT(vasp_domain) DO UPDATE SET
        response = excluded.response,
        expiration_timestamp = excluded.expiration_timestamp,
        fetched_at = excluded.fetched_at
    `);
    stmt.run({ ...row, fetched_at: new Date().toISOString() });
  }

  deletePublicKeys(vaspDomain: string): boolean {
    const stmt = this.db.prepare<[string]>("DELETE FROM public_keys WHERE vasp_domain = ?");
    return stmt.run(vaspDomain).changes > 0;
  }

  clearPublicKeys(): number {
    return this.db.prepare("DELETE FROM public_keys").run().changes;
  }

  // -----------------------------------------------------------------------
  // Payments
  // -----------------------------------------------------------------------

  insertPayment(payment: Omit<PaymentRow, "created_at">): PaymentRow {
    const row: PaymentRow = { ...payment, created_at: new Date().toISOString() };
    const stmt = this.db.prepare<PaymentRow>(`
      INSERT INTO payments (
        id, receiver, payer_identifier, sender_vasp_domain, amount, amount_unit,
        receiving_currency_code, encoded_invoice, uma_layout, created_at
      ) VALUES (
        @id, @receiver, @payer_identifier, @sender_vasp_domain, @amount, @amount_unit,
        @receiving_currency_code, @encoded_invoice, @uma_layout, @created_at
      )
    `);
    stmt.run(row);
    return row;
  }

  listPaymentsForReceiver(receiver: string): PaymentRow[] {
    const stmt = this.db.prepare<[string], PaymentRow>(
      "SELECT * FROM payments WHERE receiver = ? ORDER BY created_at ASC",
    );
    return stmt.all(receiver);
  }

  getPaymentCount(): number {
    const stmt = this.db.prepare<[], { count: number }>("SELECT COUNT(*) as count FROM payments");
    return stmt.get()?.count ?? 0;
  }

  // -----------------------------------------------------------------------
  // Post-transaction callbacks
  // -----------------------------------------------------------------------

  insertUtxoCallback(callback: Omit<UtxoCallbackRow, "received_at">): UtxoCallbackRow {
    const row: UtxoCallbackRow = { ...callback, received_at: new Date().toISOString() };
    const stmt = this.db.prepare<UtxoCallbackRow>(`
      INSERT INTO utxo_callbacks (id, vasp_domain, transaction_status, utxos, received_at)
      VALUES (@id, @vasp_domain, @transaction_status, @utxos, @received_at)
    `);
    stmt.run(row);
    return row;
  }

  listUtxoCallbacks(vaspDomain: string): UtxoCallbackRow[] {
    const stmt = this.db.prepare<[string], UtxoCallbackRow>(
      "SELECT * FROM utxo_callbacks WHERE vasp_domain = ? ORDER BY received_at ASC",
    );
    return stmt.all(vaspDomain);
  }
}
