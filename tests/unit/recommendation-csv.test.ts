import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  formatRecommendationsCsv,
  readRecommendationsCsv,
  toRecommendationRecords,
  writeRecommendationsCsv,
} from '../../src/recommendations/recommendation-csv';
import { RecommendationRecord } from '../../src/recommendations/types';

describe('recommendation CSV', () => {
  describe('toRecommendationRecords', () => {
    it('should emit one row per recommendation', () => {
      const records = toRecommendationRecords({
        kind: 'recommended',
        messageId: 'M1',
        categories: ['Running Shoes'],
        recommendations: [
          { messageId: 'M1', productId: 'P1', confidence: 0.9, reasoning: 'Best fit', rank: 1 },
          { messageId: 'M1', productId: 'P2', confidence: 0.7, reasoning: 'Also good', rank: 2 },
        ],
      });

      expect(records).toEqual([
        { messageId: 'M1', productId: 'P1', confidence: 0.9, reasoning: 'Best fit', rank: 1, outcome: 'recommended' },
        { messageId: 'M1', productId: 'P2', confidence: 0.7, reasoning: 'Also good', rank: 2, outcome: 'recommended' },
      ]);
    });

    it('should explain a message with no recommendation in a single row', () => {
      expect(toRecommendationRecords({
        kind: 'no_eligible_candidates',
        messageId: 'M2',
        categories: ['Laptops'],
        reasoning: 'No eligible products in the requested categories',
      })).toEqual([{
        messageId: 'M2',
        productId: null,
        confidence: null,
        reasoning: 'No eligible product: No eligible products in the requested categories',
        rank: null,
        outcome: 'no_eligible_candidates',
      }]);

      expect(toRecommendationRecords({
        kind: 'unavailable',
        messageId: 'M3',
        stage: 'selection',
        reason: 'Ranker returned unknown product id P9',
      })[0].reasoning).toBe('Processing failed (selection): Ranker returned unknown product id P9');
    });
  });

  describe('formatRecommendationsCsv', () => {
    it('should write empty cells for rows without a product', () => {
      const csv = formatRecommendationsCsv([
        { messageId: 'M1', productId: 'P1', confidence: 0.9, reasoning: 'Light, fast', rank: 1, outcome: 'recommended' },
        { messageId: 'M2', productId: null, confidence: null, reasoning: 'No purchase intent: Thanks', rank: null, outcome: 'no_intent' },
      ]);

      expect(csv).toBe([
        'message_id,recommended_product_id,confidence,reasoning,rank,outcome',
        'M1,P1,0.9,"Light, fast",1,recommended',
        'M2,,,No purchase intent: Thanks,,no_intent',
        '',
      ].join('\n'));
    });
  });

  describe('file round trip', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'recs-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should read back what it wrote, creating missing directories', () => {
      const records: RecommendationRecord[] = [
        { messageId: 'M1', productId: 'P1', confidence: 0.85, reasoning: 'Fits "long runs"', rank: 1, outcome: 'recommended' },
        { messageId: 'M2', productId: null, confidence: null, reasoning: 'Processing failed (classification): timeout', rank: null, outcome: 'unavailable' },
      ];
      const file = path.join(dir, 'out', 'recommendations.csv');

      writeRecommendationsCsv(file, records);

      expect(readRecommendationsCsv(file)).toEqual({ records, warnings: [] });
    });

    it('should read a historical export without rank or outcome columns', () => {
      const file = path.join(dir, 'history.csv');
      fs.writeFileSync(file, [
        'message_id,recommended_product_id,confidence,reasoning',
        'M1,P3,0.55,Popular shoe',
        'M2,P9,1.5,Overconfident',
        ',P1,0.5,No message',
      ].join('\n'));

      const { records, warnings } = readRecommendationsCsv(file);

      expect(records).toEqual([
        { messageId: 'M1', productId: 'P3', confidence: 0.55, reasoning: 'Popular shoe', rank: null, outcome: null },
      ]);
      expect(warnings).toEqual([
        expect.objectContaining({ file: 'history.csv', reason: 'invalid confidence "1.5"' }),
        expect.objectContaining({ file: 'history.csv', reason: 'missing message_id' }),
      ]);
    });

    it('should fail when the file is missing', () => {
      expect(() => readRecommendationsCsv(path.join(dir, 'nope.csv'))).toThrow('Recommendations file not found');
    });
  });
});
