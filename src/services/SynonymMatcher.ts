import fs from 'fs';
import { z } from 'zod';
import { Market, SynonymGroup, SynonymMethod } from '../types';
import { MarketRepository } from '../data/repositories';
import { communityDetection } from '../statistics/StatisticalModels';
import { compareText } from '../detectors/detectorHelpers';
import { advancedLogger } from '../utils/AdvancedLogger';
import { ConfigurationError, errorMessage } from '../utils/ErrorHandler';
import { logger } from '../utils/logger';

const groupEntrySchema = z.object({
  name: z.string().min(1),
  keywords: z.array(z.string()).default([]),
  explicit: z.array(z.string()).default([]),
  method: z.enum(['keyword', 'embedding', 'manual']).default('keyword'),
  group_min_size: z.number().int().nonnegative().default(1),
});

export const synonymConfigSchema = z.object({
  threshold: z.number().min(0).max(1).optional(),
  min_size: z.number().int().min(2).optional(),
  groups: z.array(groupEntrySchema).default([]),
});

export type SynonymConfig = z.infer<typeof synonymConfigSchema>;

export interface SynonymMatcherOptions {
  method: 'keyword' | 'embedding' | 'auto';
  similarityThreshold: number;
  minClusterSize: number;
  /** Markets considered per rebuild. */
  marketLimit?: number;
}

export function loadSynonymConfig(configPath: string): SynonymConfig {
  if (!fs.existsSync(configPath)) {
    return { groups: [] };
  }
  let json: unknown;
  try {
    json = JSON.parse(fs.readFileSync(configPath, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`Synonym config at ${configPath} is not valid JSON: ${errorMessage(error)}`);
  }
  const parsed = synonymConfigSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigurationError(`Synonym config at ${configPath} is invalid`, {
      issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return parsed.data;
}

function uniqueSorted(ids: Iterable<string>): string[] {
  return [...new Set(ids)].sort(compareText);
}

/**
 * Keyword grouping: a market joins a group when its lower-cased title
 * contains one of the group's keywords or its id is listed explicitly.
 */
export function keywordGroups(markets: Market[], config: SynonymConfig): SynonymGroup[] {
  const groups: SynonymGroup[] = [];
  for (const entry of config.groups) {
    const keywords = entry.keywords.map(keyword => keyword.toLowerCase()).filter(keyword => keyword.length > 0);
    const explicit = new Set(entry.explicit);
    const members = uniqueSorted(
      markets
        .filter(market => {
          const title = market.title.toLowerCase();
          return keywords.some(keyword => title.includes(keyword)) || explicit.has(market.id);
        })
        .map(market => market.id)
    );
    if (members.length < entry.group_min_size) continue;
    groups.push({ name: entry.name, method: entry.method, members });
  }
  return groups;
}

/**
 * Merge groups that share a member. The earlier group absorbs the later
 * one's members and the absorbed group is emptied; repeats until no two
 * groups overlap.
 */
export function mergeOverlapping(groups: SynonymGroup[]): SynonymGroup[] {
  const working = groups.map(group => ({ ...group, members: [...group.members] }));
  let merged = true;
  while (merged) {
    merged = false;
    for (let i = 0; i < working.length && !merged; i++) {
      const owned = new Set(working[i].members);
      for (let j = i + 1; j < working.length; j++) {
        if (!working[j].members.some(id => owned.has(id))) continue;
        working[i].members.push(...working[j].members);
        working[j].members = [];
        merged = true;
        break;
      }
    }
  }
  return working;
}

/**
 * Automatic clusters from market embeddings, with the configured explicit
 * lists merged in union-find style. Clusters are named after their first
 * member. Clustering failures leave only the explicit groups.
 */
export function embeddingGroups(markets: Market[], config: SynonymConfig, threshold: number, minSize: number): SynonymGroup[] {
  const embedded = markets.filter(market => market.embedding && market.embedding.length > 0);
  const vectors = embedded.map(market => market.embedding ?? []);

  let clusters: number[][] = [];
  try {
    clusters = communityDetection(vectors, threshold, minSize);
  } catch (error) {
    advancedLogger.warn('Embedding clustering unavailable, using explicit groups only', {
      component: 'synonym_matcher',
      operation: 'community_detection',
      metadata: { error: errorMessage(error), markets: embedded.length },
    });
  }

  const automatic: SynonymGroup[] = clusters.map(indices => {
    const members = uniqueSorted(indices.map(index => embedded[index].id));
    return { name: `cluster:${members[0]}`, method: 'embedding', members };
  });
  const explicit: SynonymGroup[] = config.groups
    .filter(entry => entry.explicit.length > 0)
    .map(entry => ({ name: entry.name, method: 'manual', members: [...entry.explicit] }));

  return mergeOverlapping([...automatic, ...explicit])
    .map(group => ({ ...group, members: uniqueSorted(group.members) }))
    .filter(group => group.members.length >= 2);
}

/**
 * Rebuilds synonym groups from the configured keyword lists or stored
 * market embeddings and replaces the stored membership of each group.
 */
export class SynonymMatcher {
  constructor(
    private readonly markets: MarketRepository,
    private readonly config: SynonymConfig,
    private readonly options: SynonymMatcherOptions
  ) {}

  resolveMethod(markets: Market[]): Exclude<SynonymMethod, 'manual'> {
    if (this.options.method === 'keyword') return 'keyword';
    if (this.options.method === 'embedding') return 'embedding';
    return markets.some(market => market.embedding && market.embedding.length > 0) ? 'embedding' : 'keyword';
  }

  async buildGroups(): Promise<SynonymGroup[]> {
    const markets = await this.markets.listMarkets({ limit: this.options.marketLimit ?? 200 });
    const method = this.resolveMethod(markets);
    const groups = method === 'embedding'
      ? embeddingGroups(
          markets,
          this.config,
          this.config.threshold ?? this.options.similarityThreshold,
          this.config.min_size ?? this.options.minClusterSize
        )
      : keywordGroups(markets, this.config);

    await this.persist(groups);
    logger.debug(`Synonym groups rebuilt (${method}): ${groups.length}`);
    return groups;
  }

  private async persist(groups: SynonymGroup[]): Promise<void> {
    for (const group of groups) {
      try {
        const existing = await this.markets.findGroupByTitle(group.name);
        const groupId = await this.markets.upsertGroup(group.name, group.method);
        await this.markets.replaceMembers(groupId, group.members);
        advancedLogger.debug(existing ? 'Synonym group updated' : 'Synonym group created', {
          component: 'synonym_matcher',
          operation: 'persist_group',
          metadata: { group: group.name, size: group.members.length },
        });
      } catch (error) {
        advancedLogger.error('Failed to persist synonym group', error, {
          component: 'synonym_matcher',
          operation: 'persist_group',
          metadata: { group: group.name },
        });
      }
    }
  }
}
