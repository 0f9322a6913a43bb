import { SQLDialect } from './DatabaseDialect';

export class SchemaBuilder {
  private dialect: SQLDialect;

  constructor(dialect: SQLDialect) {
    this.dialect = dialect;
  }

  buildSchema(): string {
    const d = this.dialect;

    return `
      -- Markets and their outcome legs
      CREATE TABLE IF NOT EXISTS markets (
        id ${d.varchar(128)} PRIMARY KEY,
        title ${d.text()} NOT NULL,
        status ${d.varchar(16)} NOT NULL DEFAULT 'active',
        platform ${d.varchar(32)} NOT NULL DEFAULT 'polymarket',
        tags ${d.jsonType()},
        starts_at ${d.timestamp()},
        ends_at ${d.timestamp()},
        embedding ${d.jsonType()},
        updated_at ${d.timestamp()} NOT NULL DEFAULT ${d.now()}
      );

      CREATE TABLE IF NOT EXISTS market_options (
        id ${d.varchar(128)} PRIMARY KEY,
        market_id ${d.varchar(128)} NOT NULL REFERENCES markets(id),
        label ${d.text()} NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_market_options_market ON market_options(market_id);

      -- Point observations, unique per (ts, market, option)
      CREATE TABLE IF NOT EXISTS ticks (
        ts ${d.timestamp()} NOT NULL,
        market_id ${d.varchar(128)} NOT NULL,
        option_id ${d.varchar(128)} NOT NULL,
        price ${d.decimal()} NOT NULL,
        volume ${d.decimal()} NOT NULL DEFAULT 0,
        best_bid ${d.decimal()} NOT NULL DEFAULT 0,
        best_ask ${d.decimal()} NOT NULL DEFAULT 0,
        liquidity ${d.decimal()} NOT NULL DEFAULT 0,
        PRIMARY KEY (ts, market_id, option_id)
      );

      CREATE INDEX IF NOT EXISTS idx_ticks_market_ts ON ticks(market_id, ts);

      CREATE TABLE IF NOT EXISTS synonym_groups (
        id ${d.serialPrimaryKey()},
        title ${d.varchar(200)} NOT NULL UNIQUE,
        method ${d.varchar(16)} NOT NULL,
        updated_at ${d.timestamp()} NOT NULL DEFAULT ${d.now()}
      );

      CREATE TABLE IF NOT EXISTS synonym_group_members (
        group_id ${d.integer()} NOT NULL REFERENCES synonym_groups(id),
        market_id ${d.varchar(128)} NOT NULL,
        PRIMARY KEY (group_id, market_id)
      );

      -- Versioned rule documents
      CREATE TABLE IF NOT EXISTS rule_defs (
        id ${d.serialPrimaryKey()},
        name ${d.varchar(120)} NOT NULL UNIQUE,
        type ${d.varchar(40)} NOT NULL,
        enabled ${d.boolean()} NOT NULL,
        document ${d.jsonType()} NOT NULL,
        raw_source ${d.text()} NOT NULL,
        version ${d.integer()} NOT NULL DEFAULT 1,
        updated_at ${d.timestamp()} NOT NULL DEFAULT ${d.now()}
      );

      -- Append-only signal log
      CREATE TABLE IF NOT EXISTS signals (
        id ${d.serialPrimaryKey()},
        market_id ${d.varchar(128)} NOT NULL,
        option_id ${d.varchar(128)},
        rule_id ${d.integer()},
        level ${d.varchar(4)} NOT NULL,
        score ${d.decimal()} NOT NULL,
        edge_score ${d.decimal()} NOT NULL,
        message ${d.text()} NOT NULL,
        payload ${d.jsonType()} NOT NULL,
        source ${d.varchar(8)} NOT NULL,
        confidence ${d.decimal()},
        features ${d.jsonType()},
        reason ${d.text()},
        created_at ${d.timestamp()} NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_signals_created ON signals(created_at);

      CREATE TABLE IF NOT EXISTS audit_log (
        id ${d.serialPrimaryKey()},
        actor ${d.varchar(64)} NOT NULL,
        action ${d.varchar(64)} NOT NULL,
        target_id ${d.varchar(128)},
        meta ${d.jsonType()},
        created_at ${d.timestamp()} NOT NULL DEFAULT ${d.now()}
      );

      CREATE TABLE IF NOT EXISTS rule_kpi_daily (
        day ${d.varchar(10)} NOT NULL,
        rule_type ${d.varchar(40)} NOT NULL,
        signals ${d.integer()} NOT NULL DEFAULT 0,
        p1_signals ${d.integer()} NOT NULL DEFAULT 0,
        avg_gap ${d.decimal()},
        est_edge_bps ${d.decimal()},
        PRIMARY KEY (day, rule_type)
      );

      CREATE TABLE IF NOT EXISTS execution_policies (
        id ${d.serialPrimaryKey()},
        name ${d.varchar(64)} NOT NULL UNIQUE,
        max_notional_per_order ${d.decimal()} NOT NULL,
        max_concurrent_orders ${d.integer()} NOT NULL,
        max_daily_notional ${d.decimal()} NOT NULL,
        slippage_bps ${d.decimal()} NOT NULL
      );

      CREATE TABLE IF NOT EXISTS order_intents (
        id ${d.serialPrimaryKey()},
        signal_id ${d.integer()},
        market_id ${d.varchar(128)} NOT NULL,
        option_id ${d.varchar(128)},
        side ${d.varchar(4)} NOT NULL,
        qty ${d.decimal()} NOT NULL,
        limit_price ${d.decimal()} NOT NULL,
        ttl_secs ${d.integer()} NOT NULL,
        policy_id ${d.integer()},
        status ${d.varchar(16)} NOT NULL,
        detail ${d.jsonType()} NOT NULL,
        created_at ${d.timestamp()} NOT NULL,
        updated_at ${d.timestamp()} NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_order_intents_status ON order_intents(status)
    `;
  }
}
