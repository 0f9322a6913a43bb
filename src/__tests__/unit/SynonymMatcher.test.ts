import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  SynonymConfig,
  SynonymMatcher,
  embeddingGroups,
  keywordGroups,
  loadSynonymConfig,
  mergeOverlapping,
} from '../../services/SynonymMatcher';
import { ConfigurationError } from '../../utils/ErrorHandler';
import { InMemoryMarketStore } from '../mocks/InMemoryRepositories';
import { MarketDataMocks } from '../mocks/MarketDataMocks';

const markets = [
  MarketDataMocks.market({ id: 'm1', title: 'Will candidate A win the election?' }),
  MarketDataMocks.market({ id: 'm2', title: 'Election turnout above 60%?' }),
  MarketDataMocks.market({ id: 'm3', title: 'Fed hike in March?' }),
];

const keywordConfig: SynonymConfig = {
  groups: [
    { name: 'election', keywords: ['Election'], explicit: [], method: 'keyword', group_min_size: 2 },
    { name: 'fed', keywords: ['fed'], explicit: [], method: 'keyword', group_min_size: 2 },
    { name: 'pinned', keywords: [], explicit: ['m3', 'm1'], method: 'manual', group_min_size: 1 },
  ],
};

describe('SynonymMatcher', () => {
  describe('keywordGroups', () => {
    test('should group markets by case-insensitive keyword and explicit id', () => {
      expect(keywordGroups(markets, keywordConfig)).toEqual([
        { name: 'election', method: 'keyword', members: ['m1', 'm2'] },
        { name: 'pinned', method: 'manual', members: ['m1', 'm3'] },
      ]);
    });
  });

  describe('mergeOverlapping', () => {
    test('should fold later overlapping groups into the earlier one', () => {
      const merged = mergeOverlapping([
        { name: 'a', method: 'embedding', members: ['1', '2'] },
        { name: 'b', method: 'embedding', members: ['3'] },
        { name: 'c', method: 'manual', members: ['2', '4'] },
      ]);

      expect(merged.map(group => group.members)).toEqual([['1', '2', '2', '4'], ['3'], []]);
    });
  });

  describe('embeddingGroups', () => {
    const embedded = [
      MarketDataMocks.market({ id: 'e1', title: 'one', embedding: [1, 0] }),
      MarketDataMocks.market({ id: 'e2', title: 'two', embedding: [0.9, 0.1] }),
      MarketDataMocks.market({ id: 'e3', title: 'three', embedding: [0, 1] }),
    ];
    const config: SynonymConfig = {
      groups: [{ name: 'manual', keywords: [], explicit: ['e3', 'x9'], method: 'manual', group_min_size: 1 }],
    };

    test('should cluster similar embeddings and keep explicit groups', () => {
      expect(embeddingGroups(embedded, config, 0.75, 2)).toEqual([
        { name: 'cluster:e1', method: 'embedding', members: ['e1', 'e2'] },
        { name: 'manual', method: 'manual', members: ['e3', 'x9'] },
      ]);
    });

    test('should merge an explicit group into an overlapping cluster', () => {
      const overlapping: SynonymConfig = {
        groups: [{ name: 'manual', keywords: [], explicit: ['e2', 'e3'], method: 'manual', group_min_size: 1 }],
      };

      expect(embeddingGroups(embedded, overlapping, 0.75, 2)).toEqual([
        { name: 'cluster:e1', method: 'embedding', members: ['e1', 'e2', 'e3'] },
      ]);
    });

    test('should fall back to explicit groups when clustering fails', () => {
      const mismatched = [...embedded, MarketDataMocks.market({ id: 'e4', title: 'four', embedding: [1, 0, 0] })];

      expect(embeddingGroups(mismatched, config, 0.75, 2)).toEqual([
        { name: 'manual', method: 'manual', members: ['e3', 'x9'] },
      ]);
    });
  });

  describe('buildGroups', () => {
    test('should persist keyword groups and expose peers', async () => {
      const store = new InMemoryMarketStore();
      for (const market of markets) await store.upsertMarket(market);
      const matcher = new SynonymMatcher(store, keywordConfig, { method: 'keyword', similarityThreshold: 0.75, minClusterSize: 2 });

      const groups = await matcher.buildGroups();

      expect(groups.map(group => group.name)).toEqual(['election', 'pinned']);
      expect(await store.synonymPeers('m1')).toEqual(['m2', 'm3']);
      expect(await store.synonymPeers('m2')).toEqual(['m1']);
    });

    test('should pick embeddings automatically when markets carry them', () => {
      const matcher = new SynonymMatcher(new InMemoryMarketStore(), keywordConfig, {
        method: 'auto',
        similarityThreshold: 0.75,
        minClusterSize: 2,
      });

      expect(matcher.resolveMethod(markets)).toBe('keyword');
      expect(matcher.resolveMethod([MarketDataMocks.market({ embedding: [1] })])).toBe('embedding');
    });
  });

  describe('loadSynonymConfig', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'synonyms-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    test('should return no groups for a missing file', () => {
      expect(loadSynonymConfig(path.join(dir, 'absent.json'))).toEqual({ groups: [] });
    });

    test('should apply defaults to group entries', () => {
      const file = path.join(dir, 'synonyms.json');
      fs.writeFileSync(file, JSON.stringify({ threshold: 0.8, groups: [{ name: 'fed', keywords: ['fed'] }] }));

      expect(loadSynonymConfig(file)).toEqual({
        threshold: 0.8,
        groups: [{ name: 'fed', keywords: ['fed'], explicit: [], method: 'keyword', group_min_size: 1 }],
      });
    });

    test('should reject malformed files', () => {
      const file = path.join(dir, 'broken.json');
      fs.writeFileSync(file, '{ not json');

      expect(() => loadSynonymConfig(file)).toThrow(ConfigurationError);
    });
  });
});
