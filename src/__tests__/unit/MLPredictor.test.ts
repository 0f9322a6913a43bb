import fs from 'fs';
import os from 'os';
import path from 'path';
import { LogisticModel, loadModel } from '../../services/MLPredictor';
import { FeatureRow } from '../../types';
import { ConfigurationError } from '../../utils/ErrorHandler';

const row: FeatureRow = {
  midPrice: 0.75,
  spread: 0.02,
  volume: 100,
  bestBidSize: 100,
  bestAskSize: 100,
  sizeImbalance: 0,
  zscoreSpread5m: 0,
  priceVelocity10s: 0,
  timeToExpiryMinutes: 60,
  daysToExpiry: 1 / 24,
  synonymPriceDeltaZscore: 0,
  volatility5m: 0,
};

describe('MLPredictor', () => {
  test('should apply standardised coefficients through the sigmoid', () => {
    const model = new LogisticModel({
      name: 'unit',
      intercept: 0,
      coefficients: { midPrice: 2 },
      means: { midPrice: 0.5 },
      scales: { midPrice: 0.25 },
    });

    const [probability] = model.predictProbabilities([row]);

    expect(probability).toBeCloseTo(1 / (1 + Math.exp(-2)), 10);
  });

  test('should ignore features without a coefficient', () => {
    const model = new LogisticModel({ name: 'unit', intercept: 0, coefficients: {}, means: {}, scales: {} });

    expect(model.predictProbabilities([row, { ...row, volume: 9999 }])).toEqual([0.5, 0.5]);
  });

  test('should load the bundled model', () => {
    const model = loadModel(path.join(__dirname, '..', '..', '..', 'models', 'ml-model.json'));
    const [probability] = model.predictProbabilities([row]);

    expect(model.spec.name).toBe('logistic-v1');
    expect(probability).toBeGreaterThan(0);
    expect(probability).toBeLessThan(1);
  });

  describe('loadModel failures', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'model-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    test('should reject missing, malformed and invalid models', () => {
      const malformed = path.join(dir, 'malformed.json');
      const invalid = path.join(dir, 'invalid.json');
      fs.writeFileSync(malformed, '{');
      fs.writeFileSync(invalid, JSON.stringify({ coefficients: {} }));

      expect(() => loadModel(path.join(dir, 'absent.json'))).toThrow(ConfigurationError);
      expect(() => loadModel(malformed)).toThrow(/not valid JSON/);
      expect(() => loadModel(invalid)).toThrow(/is invalid/);
    });
  });
});
