import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CsvCatalogDataSource } from '../../src/catalog/csv-data-source';

describe('CsvCatalogDataSource', () => {
  let dir: string;
  let source: CsvCatalogDataSource;

  const write = (file: string, lines: string[]): void => {
    fs.writeFileSync(path.join(dir, file), `${lines.join('\n')}\n`);
  };

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'catalog-'));
    source = new CsvCatalogDataSource(dir);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('loadProducts', () => {
    it('should parse products and skip malformed rows with a warning', async () => {
      write('products.csv', [
        'product_id,name,description,category,price,avg_rating,stock_quantity,preorder_eligible',
        'P1,Road Runner,"Cushioned, light",running shoes,119.00,4.6,25,false',
        'P2,Trail Pro,Grippy,Running Shoes,149,4.2,0,yes',
        'P3,Gadget,Mystery,Gadgets,10,4.0,1,false',
        'P4,Cheap Mat,Thin,Yoga,-5,4.0,1,false',
        'P5,Odd Mat,Thick,Yoga,20,6,1,false',
        'P6,Half Mat,Thick,Yoga,20,4.0,1.5,false',
        'P7,Maybe Mat,Thick,Yoga,20,4.0,1,maybe',
        ',No Id,Thick,Yoga,20,4.0,1,false',
        'P1,Duplicate,Again,Yoga,20,4.0,1,false',
      ]);

      const products = await source.loadProducts();

      expect(products).toEqual([
        {
          id: 'P1',
          name: 'Road Runner',
          description: 'Cushioned, light',
          category: 'Running Shoes',
          price: 119,
          rating: 4.6,
          stockCount: 25,
          preorderEligible: false,
        },
        {
          id: 'P2',
          name: 'Trail Pro',
          description: 'Grippy',
          category: 'Running Shoes',
          price: 149,
          rating: 4.2,
          stockCount: 0,
          preorderEligible: true,
        },
      ]);
      expect(source.warnings.map((w) => w.reason)).toEqual([
        'unknown category "Gadgets"',
        'invalid price "-5"',
        'invalid avg_rating "6"',
        'invalid stock_quantity "1.5"',
        'invalid preorder_eligible "maybe"',
        'missing product_id',
        'duplicate id P1; keeping first',
      ]);
      expect(source.warnings.every((w) => w.file === 'products.csv')).toBe(true);
    });

    it('should default preorder eligibility when the column is absent', async () => {
      write('products.csv', [
        'product_id,name,description,category,price,avg_rating,stock_quantity',
        'P1,Bottle,Steel,Water Bottles,30,4.7,100',
      ]);

      const [product] = await source.loadProducts();

      expect(product.preorderEligible).toBe(false);
    });

    it('should fail when the file is missing', async () => {
      await expect(source.loadProducts()).rejects.toThrow(`Data file not found: ${path.join(dir, 'products.csv')}`);
    });
  });

  describe('messages and outcomes', () => {
    beforeEach(() => {
      write('messages.csv', [
        'message_id,user_id,timestamp,message,converted_to_purchase,clicked_product_ids',
        'M1,U1,2026-03-01T09:00:00Z,Need running shoes,P1,P1;P2',
        'M2,U2,2026-03-01T10:00:00Z,Where is my order?,,',
        'M3,U3,2026-03-01T11:00:00Z,,,',
      ]);
    });

    it('should load messages and skip empty bodies', async () => {
      const messages = await source.loadMessages();

      expect(messages).toEqual([
        { id: 'M1', body: 'Need running shoes', timestamp: '2026-03-01T09:00:00Z', userId: 'U1' },
        { id: 'M2', body: 'Where is my order?', timestamp: '2026-03-01T10:00:00Z', userId: 'U2' },
      ]);
      expect(source.warnings.map((w) => w.reason)).toEqual(['empty message body for M3']);
    });

    it('should read clicks and purchases from the message log', async () => {
      const outcomes = await source.loadHistoricalOutcomes();

      expect(outcomes.get('M1')).toEqual({ messageId: 'M1', clickedProductIds: ['P1', 'P2'], purchasedProductId: 'P1' });
      expect(outcomes.get('M2')).toEqual({ messageId: 'M2', clickedProductIds: [], purchasedProductId: null });
      expect(outcomes.has('M3')).toBe(false);
    });

    it('should take messages and outcomes from the same rows', async () => {
      write('messages.csv', [
        'message_id,user_id,timestamp,message,converted_to_purchase,clicked_product_ids',
        'M1,U1,2026-03-01T09:00:00Z,need shoes,P1,P1',
        'M1,U1,2026-03-01T09:05:00Z,need a bottle,P9,P9',
        'M2,U2,2026-03-01T10:00:00Z,,,',
      ]);

      const messages = await source.loadMessages();
      const outcomes = await source.loadHistoricalOutcomes();

      expect(messages.map((m) => m.body)).toEqual(['need shoes']);
      expect(outcomes.get('M1')).toEqual({ messageId: 'M1', clickedProductIds: ['P1'], purchasedProductId: 'P1' });
      expect([...outcomes.keys()]).toEqual(['M1']);
      expect(source.warnings.map((w) => w.reason)).toEqual(['duplicate id M1; keeping first', 'empty message body for M2']);
    });
  });

  it('should locate the historical recommendations beside the catalog', () => {
    expect(source.historyPath).toBe(path.join(dir, 'recommendations_history.csv'));
  });
});
