import { PriceOracle } from '../../core/market/priceOracle';
import { ForkId } from '../../types/types';

describe('PriceOracle', () => {
  const originalConsole = { ...console };

  beforeAll(() => {
    console.log = jest.fn();
    console.error = jest.fn();
    console.warn = jest.fn();
    console.info = jest.fn();
  });

  afterAll(() => {
    console.log = originalConsole.log;
    console.error = originalConsole.error;
    console.warn = originalConsole.warn;
    console.info = originalConsole.info;
  });

  const sustain = (oracle: PriceOracle) => {
    oracle.checkForkSustained({ [ForkId.V27]: 104, [ForkId.V26]: 103 }, 100, 60);
  };

  it('should start every fork at the base price', () => {
    const oracle = new PriceOracle();

    expect(oracle.getPrices()).toEqual({ [ForkId.V27]: 60000, [ForkId.V26]: 60000 });
    expect(oracle.getPriceRatio()).toBe(1);
    expect(oracle.getPriceHistory()).toHaveLength(2);
  });

  it('should reject coefficients that do not sum to 1', () => {
    expect(() => new PriceOracle({
      coefficients: { chainWeight: 0.5, economicWeight: 0.5, hashrateWeight: 0.5 },
    })).toThrow('Price coefficients must sum to 1.0');
  });

  describe('fork sustained gate', () => {
    it('should hold the base price while the combined depth is shallow', () => {
      // Given: Heights 101 and 102 over an ancestor at 100, depth 3
      const oracle = new PriceOracle();

      // When: Refresh with lopsided weights
      const prices = oracle.updatePricesFromState({
        heights: { [ForkId.V27]: 101, [ForkId.V26]: 102 },
        economicPcts: { [ForkId.V27]: 90, [ForkId.V26]: 10 },
        hashratePcts: { [ForkId.V27]: 90, [ForkId.V26]: 10 },
        commonAncestorHeight: 100,
        simTime: 60,
      });

      // Then: Both prices stay at base
      expect(prices[ForkId.V27]).toBe(60000);
      expect(prices[ForkId.V26]).toBe(60000);
      expect(oracle.isForkSustained()).toBe(false);
      expect(oracle.getForkStartHeight()).toBe(100);
    });

    it('should latch once the combined depth reaches the minimum', () => {
      const oracle = new PriceOracle();

      // When: Depth 7 and then a shallower view
      const first = oracle.checkForkSustained({ [ForkId.V27]: 104, [ForkId.V26]: 103 }, 100, 120);
      const second = oracle.checkForkSustained({ [ForkId.V27]: 101, [ForkId.V26]: 101 }, 100, 180);

      // Then: Only the first call closes the latch, which stays closed
      expect(first).toBe(true);
      expect(second).toBe(false);
      expect(oracle.isForkSustained()).toBe(true);
      expect(oracle.getForkSustainedAt()).toBe(120);
    });

    it('should compute depth from every fork past the ancestor', () => {
      expect(PriceOracle.forkDepth({ [ForkId.V27]: 101, [ForkId.V26]: 102 }, 100)).toBe(3);
    });
  });

  describe('price formation', () => {
    it('should combine weighted factors once sustained', () => {
      // Given: A sustained split
      const oracle = new PriceOracle();
      sustain(oracle);

      // When: chain 0.6, economic 0.7, hashrate 0.6
      const price = oracle.updatePrice(ForkId.V27, 0.6, 0.7, 0.6, 60);

      // Then: 1.04*0.3 + 1.08*0.5 + 1.04*0.2 = 1.06
      expect(price).toBeCloseTo(63600, 6);
      expect(oracle.getPrice(ForkId.V27)).toBeCloseTo(63600, 6);
    });

    it('should clamp to the max divergence', () => {
      const oracle = new PriceOracle({ maxDivergence: 0.1 });
      sustain(oracle);

      expect(oracle.updatePrice(ForkId.V27, 1, 1, 1, 60)).toBeCloseTo(66000, 6);
      expect(oracle.updatePrice(ForkId.V26, 0, 0, 0, 60)).toBeCloseTo(54000, 6);
    });

    it('should reach the factor bounds at the default divergence', () => {
      const oracle = new PriceOracle();
      sustain(oracle);

      expect(oracle.updatePrice(ForkId.V27, 1, 1, 1, 60)).toBeCloseTo(72000, 6);
      expect(oracle.updatePrice(ForkId.V26, 0, 0, 0, 60)).toBeCloseTo(48000, 6);
    });

    it('should use chain weight overrides when refreshing from state', () => {
      // Given: A sustained split with chainwork shares 0.75/0.25
      const oracle = new PriceOracle();

      // When: Refresh at depth 14
      const prices = oracle.updatePricesFromState({
        heights: { [ForkId.V27]: 110, [ForkId.V26]: 104 },
        economicPcts: { [ForkId.V27]: 80, [ForkId.V26]: 20 },
        hashratePcts: { [ForkId.V27]: 60, [ForkId.V26]: 40 },
        commonAncestorHeight: 100,
        simTime: 300,
        chainWeightOverrides: { [ForkId.V27]: 0.75, [ForkId.V26]: 0.25 },
      });

      // Then: v27 combined 1.098, v26 combined 0.902
      expect(prices[ForkId.V27]).toBeCloseTo(65880, 6);
      expect(prices[ForkId.V26]).toBeCloseTo(54120, 6);
      expect(oracle.getPriceRatio()).toBeCloseTo(65880 / 54120, 9);
    });

    it('should tag the refresh that sustained the fork', () => {
      const oracle = new PriceOracle();

      oracle.updatePricesFromState({
        heights: { [ForkId.V27]: 104, [ForkId.V26]: 103 },
        economicPcts: { [ForkId.V27]: 50, [ForkId.V26]: 50 },
        hashratePcts: { [ForkId.V27]: 50, [ForkId.V26]: 50 },
        commonAncestorHeight: 100,
        simTime: 60,
      });

      const latest = oracle.getPriceHistory(ForkId.V26, 60);
      expect(latest).toHaveLength(1);
      expect(latest[0].metadata).toEqual({ forkSustained: true, forkDepth: 7 });
    });
  });

  describe('history', () => {
    it('should build a merged timeline carrying the last price', () => {
      const oracle = new PriceOracle();
      sustain(oracle);
      oracle.updatePrice(ForkId.V27, 1, 1, 1, 60);

      const timeline = oracle.getPriceTimeline();

      expect(timeline.timestamps).toEqual([0, 60]);
      expect(timeline.prices[ForkId.V27][0]).toBe(60000);
      expect(timeline.prices[ForkId.V27][1]).toBeCloseTo(72000, 6);
      expect(timeline.prices[ForkId.V26]).toEqual([60000, 60000]);
    });

    it('should filter history by fork and window', () => {
      const oracle = new PriceOracle();
      oracle.updatePrice(ForkId.V27, 0.5, 0.5, 0.5, 60);
      oracle.updatePrice(ForkId.V27, 0.5, 0.5, 0.5, 120);

      expect(oracle.getPriceHistory(ForkId.V27)).toHaveLength(3);
      expect(oracle.getPriceHistory(ForkId.V27, 60, 60)).toHaveLength(1);
      expect(oracle.getPriceHistory(undefined, 1)).toHaveLength(2);
    });
  });
});
