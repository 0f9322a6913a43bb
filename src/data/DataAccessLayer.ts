import { DatabaseManager, DbRow, QueryFn } from './database';
import { getDialect, SQLDialect, SqlParam } from './DatabaseDialect';
import {
  ExecutionLedger,
  ExecutionRepository,
  KpiRepository,
  KpiSample,
  MarketRepository,
  SignalQuery,
  SignalRepository,
  StoredRuleDef,
  StoredSynonymGroup,
  TickRepository,
} from './repositories';
import {
  intentStatusSchema,
  marketStatusSchema,
  parseFeatureRow,
  parseJsonColumn,
  parseJsonObject,
  parseNumberArray,
  parseSignalPayload,
  parseStringArray,
  signalLevelSchema,
  signalSourceSchema,
  synonymMethodSchema,
  tradeSideSchema,
} from './rowSchemas';
import { ruleDocumentSchema } from '../config/ruleSchema';
import {
  AuditEntry,
  EXECUTED_INTENT_STATUSES,
  ExecutionPolicy,
  IntentStatus,
  KpiRow,
  LatestTicks,
  Market,
  MarketOption,
  MarketStatus,
  NewOrderIntent,
  NewSignal,
  OPEN_INTENT_STATUSES,
  OrderIntent,
  RuleDocument,
  SignalRecord,
  SynonymGroup,
  SynonymMethod,
  Tick,
} from '../types';
import { NotFoundError } from '../utils/ErrorHandler';
import { logger } from '../utils/logger';

const TICK_INSERT_CHUNK = 100;

function toNumber(value: unknown): number {
  if (typeof value === 'number') return Number.isFinite(value) ? value : 0;
  if (typeof value === 'string' || typeof value === 'bigint') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : 0;
  }
  return 0;
}

function toNullableNumber(value: unknown): number | null {
  return value === null || value === undefined ? null : toNumber(value);
}

function toText(value: unknown): string {
  return typeof value === 'string' ? value : String(value ?? '');
}

function toDate(value: unknown): Date {
  if (value instanceof Date) return value;
  return new Date(toText(value));
}

function toNullableDate(value: unknown): Date | null {
  return value === null || value === undefined ? null : toDate(value);
}

function toBoolean(value: unknown): boolean {
  return value === true || value === 1 || value === '1' || value === 't';
}

function iso(date: Date | null): string | null {
  return date ? date.toISOString() : null;
}

function inList(values: readonly string[]): string {
  return values.map(value => `'${value}'`).join(', ');
}

function mapTick(row: DbRow): Tick {
  return {
    ts: toDate(row.ts),
    marketId: toText(row.market_id),
    optionId: toText(row.option_id),
    price: toNumber(row.price),
    volume: toNumber(row.volume),
    bestBid: toNumber(row.best_bid),
    bestAsk: toNumber(row.best_ask),
    liquidity: toNumber(row.liquidity),
  };
}

function mapMarket(row: DbRow): Market {
  const market: Market = {
    id: toText(row.id),
    title: toText(row.title),
    status: marketStatusSchema.parse(row.status),
    platform: toText(row.platform),
    tags: parseStringArray(row.tags),
    startsAt: toNullableDate(row.starts_at),
    endsAt: toNullableDate(row.ends_at),
  };
  const embedding = parseNumberArray(row.embedding);
  if (embedding) market.embedding = embedding;
  return market;
}

function mapSignal(row: DbRow): SignalRecord {
  return {
    id: toNumber(row.id),
    marketId: toText(row.market_id),
    optionId: row.option_id === null || row.option_id === undefined ? null : toText(row.option_id),
    ruleId: toNullableNumber(row.rule_id),
    level: signalLevelSchema.parse(row.level),
    score: toNumber(row.score),
    edgeScore: toNumber(row.edge_score),
    message: toText(row.message),
    payload: parseSignalPayload(row.payload),
    source: signalSourceSchema.parse(row.source),
    confidence: toNullableNumber(row.confidence),
    features: row.features === null || row.features === undefined ? null : parseFeatureRow(row.features),
    reason: row.reason === null || row.reason === undefined ? null : toText(row.reason),
    createdAt: toDate(row.created_at),
  };
}

function mapIntent(row: DbRow): OrderIntent {
  return {
    id: toNumber(row.id),
    signalId: toNullableNumber(row.signal_id),
    marketId: toText(row.market_id),
    optionId: row.option_id === null || row.option_id === undefined ? null : toText(row.option_id),
    side: tradeSideSchema.parse(row.side),
    qty: toNumber(row.qty),
    limitPrice: toNumber(row.limit_price),
    ttlSecs: toNumber(row.ttl_secs),
    policyId: toNullableNumber(row.policy_id),
    status: intentStatusSchema.parse(row.status),
    detail: parseJsonObject(row.detail),
    createdAt: toDate(row.created_at),
  };
}

function mapPolicy(row: DbRow): ExecutionPolicy {
  return {
    id: toNumber(row.id),
    name: toText(row.name),
    maxNotionalPerOrder: toNumber(row.max_notional_per_order),
    maxConcurrentOrders: toNumber(row.max_concurrent_orders),
    maxDailyNotional: toNumber(row.max_daily_notional),
    slippageBps: toNumber(row.slippage_bps),
  };
}

/**
 * SQL-backed implementation of every repository interface, on top of
 * either PostgreSQL or SQLite.
 */
export class DataAccessLayer
  implements TickRepository, MarketRepository, SignalRepository, KpiRepository, ExecutionRepository {
  public db: DatabaseManager;
  private dialect: SQLDialect;

  constructor(db: DatabaseManager) {
    this.db = db;
    this.dialect = getDialect(db.getProvider());
  }

  // Tick operations
  async insertTicks(ticks: Tick[]): Promise<number> {
    let inserted = 0;

    for (let start = 0; start < ticks.length; start += TICK_INSERT_CHUNK) {
      const chunk = ticks.slice(start, start + TICK_INSERT_CHUNK);
      const params: SqlParam[] = [];
      const values = chunk.map((tick, index) => {
        const offset = index * 8;
        params.push(
          tick.ts.toISOString(),
          tick.marketId,
          tick.optionId,
          tick.price,
          tick.volume,
          tick.bestBid,
          tick.bestAsk,
          tick.liquidity
        );
        const placeholders = Array.from({ length: 8 }, (_unused, i) => `$${offset + i + 1}`);
        return `(${placeholders.join(', ')})`;
      });

      try {
        const result = await this.db.query(`
          INSERT INTO ticks (ts, market_id, option_id, price, volume, best_bid, best_ask, liquidity)
          VALUES ${values.join(', ')}
          ${this.dialect.onConflictDoNothing('ts, market_id, option_id')}
        `, params);
        inserted += result.rowCount;
      } catch (error) {
        logger.error(`Error inserting ${chunk.length} ticks:`, error);
        throw error;
      }
    }

    return inserted;
  }

  async latestPerOption(marketId: string): Promise<LatestTicks> {
    const result = await this.db.query(`
      SELECT t.* FROM ticks t
      JOIN (
        SELECT option_id, MAX(ts) AS max_ts
        FROM ticks
        WHERE market_id = $1
        GROUP BY option_id
      ) latest ON t.option_id = latest.option_id AND t.ts = latest.max_ts
      WHERE t.market_id = $1
      ORDER BY t.option_id
    `, [marketId]);

    const latest: LatestTicks = new Map();
    for (const row of result.rows) {
      const tick = mapTick(row);
      latest.set(tick.optionId, tick);
    }
    return latest;
  }

  async recentWindow(marketId: string, since: Date, limit: number): Promise<Tick[]> {
    const result = await this.db.query(`
      SELECT * FROM ticks
      WHERE market_id = $1 AND ts >= $2
      ORDER BY ts DESC, option_id
      LIMIT $3
    `, [marketId, since.toISOString(), limit]);

    return result.rows.map(mapTick);
  }

  async latestTickTs(): Promise<Date | null> {
    const result = await this.db.query('SELECT MAX(ts) AS ts FROM ticks');
    return toNullableDate(result.rows[0]?.ts);
  }

  // Market operations
  async upsertMarket(market: Market): Promise<void> {
    try {
      await this.db.query(`
        INSERT INTO markets (id, title, status, platform, tags, starts_at, ends_at, embedding, updated_at)
        VALUES ($1, $2, $3, $4, $5, $6, $7, $8, ${this.dialect.now()})
        ${this.dialect.onConflictDoUpdate('id', `
          title = EXCLUDED.title,
          status = CASE WHEN markets.status = 'closed' THEN 'closed' ELSE EXCLUDED.status END,
          platform = EXCLUDED.platform,
          tags = EXCLUDED.tags,
          starts_at = COALESCE(EXCLUDED.starts_at, markets.starts_at),
          ends_at = COALESCE(EXCLUDED.ends_at, markets.ends_at),
          embedding = COALESCE(EXCLUDED.embedding, markets.embedding),
          updated_at = EXCLUDED.updated_at
        `)}
      `, [
        market.id,
        market.title,
        market.status,
        market.platform,
        JSON.stringify(market.tags),
        iso(market.startsAt),
        iso(market.endsAt),
        market.embedding ? JSON.stringify(market.embedding) : null,
      ]);

      logger.debug(`Market saved: ${market.id}`);
    } catch (error) {
      logger.error(`Error saving market ${market.id}:`, error);
      throw error;
    }
  }

  async upsertOptions(options: MarketOption[]): Promise<void> {
    for (const option of options) {
      await this.db.query(`
        INSERT INTO market_options (id, market_id, label)
        VALUES ($1, $2, $3)
        ${this.dialect.onConflictDoUpdate('id', 'market_id = EXCLUDED.market_id, label = EXCLUDED.label')}
      `, [option.id, option.marketId, option.label]);
    }
  }

  async listMarkets(filter: { status?: MarketStatus; limit?: number } = {}): Promise<Market[]> {
    const params: SqlParam[] = [];
    let where = '';
    if (filter.status) {
      params.push(filter.status);
      where = `WHERE status = $${params.length}`;
    }
    params.push(filter.limit ?? 1000);

    const result = await this.db.query(`
      SELECT * FROM markets
      ${where}
      ORDER BY id
      LIMIT $${params.length}
    `, params);

    return result.rows.map(mapMarket);
  }

  async getMarket(marketId: string): Promise<Market | null> {
    const result = await this.db.query('SELECT * FROM markets WHERE id = $1', [marketId]);
    const row = result.rows[0];
    return row ? mapMarket(row) : null;
  }

  async listOptions(marketId: string): Promise<MarketOption[]> {
    const result = await this.db.query(
      'SELECT * FROM market_options WHERE market_id = $1 ORDER BY id',
      [marketId]
    );
    return result.rows.map(row => ({
      id: toText(row.id),
      marketId: toText(row.market_id),
      label: toText(row.label),
    }));
  }

  // Synonym groups
  async synonymPeers(marketId: string): Promise<string[]> {
    const result = await this.db.query(`
      SELECT DISTINCT peer.market_id AS market_id
      FROM synonym_group_members own
      JOIN synonym_group_members peer ON peer.group_id = own.group_id
      WHERE own.market_id = $1 AND peer.market_id <> $1
      ORDER BY peer.market_id
    `, [marketId]);

    return result.rows.map(row => toText(row.market_id));
  }

  async findGroupByTitle(title: string): Promise<StoredSynonymGroup | null> {
    const result = await this.db.query('SELECT * FROM synonym_groups WHERE title = $1', [title]);
    const row = result.rows[0];
    if (!row) return null;
    return {
      id: toNumber(row.id),
      title: toText(row.title),
      method: synonymMethodSchema.parse(row.method),
    };
  }

  async upsertGroup(title: string, method: SynonymMethod): Promise<number> {
    const result = await this.db.query(`
      INSERT INTO synonym_groups (title, method, updated_at)
      VALUES ($1, $2, ${this.dialect.now()})
      ${this.dialect.onConflictDoUpdate('title', 'method = EXCLUDED.method, updated_at = EXCLUDED.updated_at')}
      RETURNING id
    `, [title, method]);

    const row = result.rows[0];
    if (!row) {
      throw new NotFoundError('synonym_group', title);
    }
    return toNumber(row.id);
  }

  async replaceMembers(groupId: number, marketIds: string[]): Promise<void> {
    await this.db.transaction(async (query) => {
      await query('DELETE FROM synonym_group_members WHERE group_id = $1', [groupId]);
      for (const marketId of marketIds) {
        await query(`
          INSERT INTO synonym_group_members (group_id, market_id)
          VALUES ($1, $2)
          ${this.dialect.onConflictDoNothing('group_id, market_id')}
        `, [groupId, marketId]);
      }
    });
  }

  async listGroups(): Promise<SynonymGroup[]> {
    const result = await this.db.query(`
      SELECT g.title AS title, g.method AS method, m.market_id AS market_id
      FROM synonym_groups g
      LEFT JOIN synonym_group_members m ON m.group_id = g.id
      ORDER BY g.title, m.market_id
    `);

    const groups = new Map<string, SynonymGroup>();
    for (const row of result.rows) {
      const title = toText(row.title);
      let group = groups.get(title);
      if (!group) {
        group = { name: title, method: synonymMethodSchema.parse(row.method), members: [] };
        groups.set(title, group);
      }
      if (row.market_id !== null && row.market_id !== undefined) {
        group.members.push(toText(row.market_id));
      }
    }
    return Array.from(groups.values());
  }

  // Rule definitions
  async upsertRuleDef(document: RuleDocument, rawSource: string): Promise<{ id: number; version: number }> {
    return this.db.transaction(async (query) => {
      const existing = await query('SELECT id, version, raw_source FROM rule_defs WHERE name = $1', [document.name]);
      const row = existing.rows[0];

      if (!row) {
        const inserted = await query(`
          INSERT INTO rule_defs (name, type, enabled, document, raw_source, version, updated_at)
          VALUES ($1, $2, $3, $4, $5, 1, ${this.dialect.now()})
          RETURNING id
        `, [document.name, document.type, document.enabled, JSON.stringify(document), rawSource]);
        const created = inserted.rows[0];
        if (!created) throw new NotFoundError('rule_def', document.name);
        return { id: toNumber(created.id), version: 1 };
      }

      const id = toNumber(row.id);
      const version = toText(row.raw_source) === rawSource ? toNumber(row.version) : toNumber(row.version) + 1;
      await query(`
        UPDATE rule_defs
        SET type = $1, enabled = $2, document = $3, raw_source = $4, version = $5, updated_at = ${this.dialect.now()}
        WHERE id = $6
      `, [document.type, document.enabled, JSON.stringify(document), rawSource, version, id]);

      return { id, version };
    });
  }

  async listRuleDefs(): Promise<StoredRuleDef[]> {
    const result = await this.db.query('SELECT * FROM rule_defs ORDER BY name');
    return result.rows.map(row => ({
      id: toNumber(row.id),
      name: toText(row.name),
      type: toText(row.type),
      enabled: toBoolean(row.enabled),
      version: toNumber(row.version),
      document: ruleDocumentSchema.parse(parseJsonColumn(row.document)),
      updatedAt: toDate(row.updated_at),
    }));
  }

  // Signals
  async insertSignal(signal: NewSignal, createdAt: Date): Promise<number> {
    try {
      const result = await this.db.query(`
        INSERT INTO signals (
          market_id, option_id, rule_id, level, score, edge_score, message,
          payload, source, confidence, features, reason, created_at
        )
        VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13)
        RETURNING id
      `, [
        signal.marketId,
        signal.optionId,
        signal.ruleId,
        signal.level,
        signal.score,
        signal.edgeScore,
        signal.message,
        JSON.stringify(signal.payload),
        signal.source,
        signal.confidence,
        signal.features ? JSON.stringify(signal.features) : null,
        signal.reason,
        createdAt.toISOString(),
      ]);

      const row = result.rows[0];
      if (!row) throw new NotFoundError('signal', signal.marketId);
      return toNumber(row.id);
    } catch (error) {
      logger.error(`Error saving signal for market ${signal.marketId}:`, error);
      throw error;
    }
  }

  async getSignal(id: number): Promise<SignalRecord | null> {
    const result = await this.db.query('SELECT * FROM signals WHERE id = $1', [id]);
    const row = result.rows[0];
    return row ? mapSignal(row) : null;
  }

  async fetchSignals(query: SignalQuery = {}): Promise<SignalRecord[]> {
    const params: SqlParam[] = [];
    const conditions: string[] = [];
    if (query.level) {
      params.push(query.level);
      conditions.push(`level = $${params.length}`);
    }
    if (query.marketId) {
      params.push(query.marketId);
      conditions.push(`market_id = $${params.length}`);
    }
    params.push(query.limit ?? 100);

    const result = await this.db.query(`
      SELECT * FROM signals
      ${conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : ''}
      ORDER BY created_at DESC, id DESC
      LIMIT $${params.length}
    `, params);

    return result.rows.map(mapSignal);
  }

  async insertAudit(entry: AuditEntry): Promise<void> {
    await this.db.query(`
      INSERT INTO audit_log (actor, action, target_id, meta, created_at)
      VALUES ($1, $2, $3, $4, ${this.dialect.now()})
    `, [entry.actor, entry.action, entry.targetId ?? null, entry.meta ? JSON.stringify(entry.meta) : null]);
  }

  // KPI aggregates
  async recordKpi(sample: KpiSample): Promise<void> {
    const runningAverage = (column: string): string => `
      CASE
        WHEN EXCLUDED.${column} IS NULL THEN rule_kpi_daily.${column}
        WHEN rule_kpi_daily.${column} IS NULL THEN EXCLUDED.${column}
        ELSE (rule_kpi_daily.${column} + EXCLUDED.${column}) / 2
      END`;

    await this.db.query(`
      INSERT INTO rule_kpi_daily (day, rule_type, signals, p1_signals, avg_gap, est_edge_bps)
      VALUES ($1, $2, 1, $3, $4, $5)
      ${this.dialect.onConflictDoUpdate('day, rule_type', `
        signals = rule_kpi_daily.signals + 1,
        p1_signals = rule_kpi_daily.p1_signals + EXCLUDED.p1_signals,
        avg_gap = ${runningAverage('avg_gap')},
        est_edge_bps = ${runningAverage('est_edge_bps')}
      `)}
    `, [sample.day, sample.ruleType, sample.level === 'P1' ? 1 : 0, sample.gap, sample.estEdgeBps]);
  }

  async dailyKpis(limit: number = 30): Promise<KpiRow[]> {
    const result = await this.db.query(`
      SELECT * FROM rule_kpi_daily
      ORDER BY day DESC, rule_type
      LIMIT $1
    `, [limit]);

    return result.rows.map(row => ({
      day: toText(row.day),
      ruleType: toText(row.rule_type),
      signals: toNumber(row.signals),
      p1Signals: toNumber(row.p1_signals),
      avgGap: toNullableNumber(row.avg_gap),
      estEdgeBps: toNullableNumber(row.est_edge_bps),
    }));
  }

  // Execution
  async getOrCreatePolicy(name: string, defaults: Omit<ExecutionPolicy, 'id' | 'name'>): Promise<ExecutionPolicy> {
    const existing = await this.db.query('SELECT * FROM execution_policies WHERE name = $1', [name]);
    const found = existing.rows[0];
    if (found) return mapPolicy(found);

    await this.db.query(`
      INSERT INTO execution_policies (name, max_notional_per_order, max_concurrent_orders, max_daily_notional, slippage_bps)
      VALUES ($1, $2, $3, $4, $5)
      ${this.dialect.onConflictDoNothing('name')}
    `, [name, defaults.maxNotionalPerOrder, defaults.maxConcurrentOrders, defaults.maxDailyNotional, defaults.slippageBps]);

    const created = await this.db.query('SELECT * FROM execution_policies WHERE name = $1', [name]);
    const row = created.rows[0];
    if (!row) throw new NotFoundError('execution_policy', name);
    logger.info(`Created execution policy ${name}`);
    return mapPolicy(row);
  }

  async createIntent(intent: NewOrderIntent, now: Date): Promise<OrderIntent> {
    const result = await this.db.query(`
      INSERT INTO order_intents (
        signal_id, market_id, option_id, side, qty, limit_price, ttl_secs,
        policy_id, status, detail, created_at, updated_at
      )
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $11)
      RETURNING *
    `, [
      intent.signalId,
      intent.marketId,
      intent.optionId,
      intent.side,
      intent.qty,
      intent.limitPrice,
      intent.ttlSecs,
      intent.policyId,
      intent.status,
      JSON.stringify(intent.detail),
      now.toISOString(),
    ]);

    const row = result.rows[0];
    if (!row) throw new NotFoundError('order_intent', intent.marketId);
    return mapIntent(row);
  }

  async listIntents(filter: { status?: IntentStatus; limit?: number } = {}): Promise<OrderIntent[]> {
    const params: SqlParam[] = [];
    let where = '';
    if (filter.status) {
      params.push(filter.status);
      where = `WHERE status = $${params.length}`;
    }
    params.push(filter.limit ?? 100);

    const result = await this.db.query(`
      SELECT * FROM order_intents
      ${where}
      ORDER BY created_at DESC, id DESC
      LIMIT $${params.length}
    `, params);

    return result.rows.map(mapIntent);
  }

  openIntentsCount(excludeIntentId?: number): Promise<number> {
    return this.ledger((text, params) => this.db.query(text, params)).openIntentsCount(excludeIntentId);
  }

  dailyNotional(dayStart: Date): Promise<number> {
    return this.ledger((text, params) => this.db.query(text, params)).dailyNotional(dayStart);
  }

  getIntent(id: number): Promise<OrderIntent | null> {
    return this.ledger((text, params) => this.db.query(text, params)).getIntent(id);
  }

  updateIntentStatus(id: number, status: IntentStatus, detail: Record<string, unknown>, now: Date): Promise<OrderIntent> {
    return this.ledger((text, params) => this.db.query(text, params)).updateIntentStatus(id, status, detail, now);
  }

  withLedgerLock<T>(callback: (ledger: ExecutionLedger) => Promise<T>): Promise<T> {
    return this.db.withAdvisoryLock(query => callback(this.ledger(query)));
  }

  private ledger(query: QueryFn): ExecutionLedger {
    return {
      async openIntentsCount(excludeIntentId?: number): Promise<number> {
        const result = await query(`
          SELECT COUNT(*) AS open_count FROM order_intents
          WHERE status IN (${inList(OPEN_INTENT_STATUSES)}) AND id <> $1
        `, [excludeIntentId ?? -1]);
        return toNumber(result.rows[0]?.open_count);
      },

      async dailyNotional(dayStart: Date): Promise<number> {
        const result = await query(`
          SELECT COALESCE(SUM(qty * limit_price), 0) AS notional FROM order_intents
          WHERE status IN (${inList(EXECUTED_INTENT_STATUSES)}) AND created_at >= $1
        `, [dayStart.toISOString()]);
        return toNumber(result.rows[0]?.notional);
      },

      async getIntent(id: number): Promise<OrderIntent | null> {
        const result = await query('SELECT * FROM order_intents WHERE id = $1', [id]);
        const row = result.rows[0];
        return row ? mapIntent(row) : null;
      },

      async updateIntentStatus(id: number, status: IntentStatus, detail: Record<string, unknown>, now: Date): Promise<OrderIntent> {
        const result = await query(`
          UPDATE order_intents
          SET status = $1, detail = $2, updated_at = $3
          WHERE id = $4
          RETURNING *
        `, [status, JSON.stringify(detail), now.toISOString(), id]);
        const row = result.rows[0];
        if (!row) throw new NotFoundError('order_intent', String(id));
        return mapIntent(row);
      },
    };
  }
}
