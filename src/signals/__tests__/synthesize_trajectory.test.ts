import {
  DEFAULT_ACCENT_COLOR,
  SERIES_LENGTH,
  resolvePattern,
  synthesizeTrajectory,
} from "@src/signals/business/synthesize_trajectory";
import { SignalInputError } from "@src/signals/errors";
import { TRAJECTORY_PATTERNS } from "@src/signals/types/domain";

const PRICES = [0.5, 12.34, 69, 250, 98250];
const zeroNoise = () => 0.5;

describe("synthesizeTrajectory", () => {
  it("returns four series of the fixed length for every pattern", () => {
    for (const pattern of TRAJECTORY_PATTERNS) {
      const series = synthesizeTrajectory("TEST", 42, pattern);
      expect(series.historical).toHaveLength(SERIES_LENGTH);
      expect(series.bandUpper).toHaveLength(SERIES_LENGTH);
      expect(series.bandBase).toHaveLength(SERIES_LENGTH);
      expect(series.bandLower).toHaveLength(SERIES_LENGTH);
    }
  });

  it("starts all three bands at the current price", () => {
    for (const price of PRICES) {
      const series = synthesizeTrajectory("TEST", price, "volatile");
      expect(series.bandUpper[0]).toBe(price);
      expect(series.bandBase[0]).toBe(price);
      expect(series.bandLower[0]).toBe(price);
    }
  });

  it("keeps upper >= base >= lower after the first point", () => {
    for (const price of PRICES) {
      const series = synthesizeTrajectory("TEST", price, "momentum");
      for (let i = 1; i < SERIES_LENGTH; i += 1) {
        expect(series.bandUpper[i]).toBeGreaterThanOrEqual(series.bandBase[i]);
        expect(series.bandBase[i]).toBeGreaterThanOrEqual(series.bandLower[i]);
      }
    }
  });

  it("ends the history within 3 of the price for momentum, breakout and decline", () => {
    for (const pattern of ["momentum", "breakout", "decline"]) {
      for (const price of PRICES) {
        for (let run = 0; run < 20; run += 1) {
          const { historical } = synthesizeTrajectory("TEST", price, pattern);
          const last = historical[SERIES_LENGTH - 1];
          expect(Math.abs(last - price)).toBeLessThanOrEqual(3);
        }
      }
    }
  });

  it("ends the volatile history within its oscillation bound", () => {
    for (const price of PRICES) {
      const { historical } = synthesizeTrajectory("TEST", price, "volatile");
      const last = historical[SERIES_LENGTH - 1];
      expect(Math.abs(last - price)).toBeLessThanOrEqual(0.1 * price + 5);
    }
  });

  it("follows the pattern shapes exactly when noise is zero", () => {
    const momentum = synthesizeTrajectory("TEST", 100, "momentum", {
      random: zeroNoise,
    }).historical;
    expect(momentum[0]).toBeCloseTo(80);
    expect(momentum[14]).toBeCloseTo(80 + 20 * (14 / 15));
    expect(momentum.slice(15)).toEqual([100, 100, 100, 100, 100]);

    const breakout = synthesizeTrajectory("TEST", 100, "breakout", {
      random: zeroNoise,
    }).historical;
    expect(breakout[0]).toBeCloseTo(90);
    expect(breakout[14]).toBeCloseTo(90);
    expect(breakout[15]).toBeCloseTo(92);
    expect(breakout[19]).toBeCloseTo(100);

    const decline = synthesizeTrajectory("TEST", 100, "decline", {
      random: zeroNoise,
    }).historical;
    expect(decline[0]).toBeCloseTo(120);
    expect(decline[19]).toBeCloseTo(100);

    const volatile = synthesizeTrajectory("TEST", 100, "volatile", {
      random: zeroNoise,
    }).historical;
    expect(volatile[0]).toBeCloseTo(100);
    expect(volatile[3]).toBeCloseTo(100 + Math.sin(1.5) * 10);
  });

  it("computes the forward bands from the price alone", () => {
    const series = synthesizeTrajectory("TEST", 200, "decline");
    expect(series.bandBase[10]).toBeCloseTo(210);
    expect(series.bandUpper[10]).toBeCloseTo(230 + Math.pow(10, 1.1));
    expect(series.bandLower[10]).toBeCloseTo(180 - Math.pow(10, 1.05));
  });

  it("labels the event with the price unless a label is given", () => {
    expect(synthesizeTrajectory("TEST", 69, "breakout").eventLabel).toBe(
      "Signal @ $69.00"
    );
    expect(
      synthesizeTrajectory("TEST", 69, "breakout", { eventLabel: "IPO $31" })
        .eventLabel
    ).toBe("IPO $31");
  });

  it("uses the default accent color unless one is given", () => {
    expect(synthesizeTrajectory("TEST", 10, "momentum").accentColor).toBe(
      DEFAULT_ACCENT_COLOR
    );
    expect(
      synthesizeTrajectory("TEST", 10, "momentum", { accentColor: "#123456" })
        .accentColor
    ).toBe("#123456");
  });

  it("treats unknown patterns as decline", () => {
    const unknown = synthesizeTrajectory("TEST", 100, "sideways", {
      random: zeroNoise,
    });
    const decline = synthesizeTrajectory("TEST", 100, "decline", {
      random: zeroNoise,
    });
    expect(unknown.historical).toEqual(decline.historical);
  });

  it("rejects non-positive and non-finite prices", () => {
    expect(() => synthesizeTrajectory("TEST", 0, "momentum")).toThrow(
      SignalInputError
    );
    expect(() => synthesizeTrajectory("TEST", -5, "momentum")).toThrow(
      "currentPrice for TEST must be a positive number"
    );
    expect(() => synthesizeTrajectory("TEST", Number.NaN, "momentum")).toThrow(
      SignalInputError
    );
  });
});

describe("resolvePattern", () => {
  it("normalizes case and whitespace", () => {
    expect(resolvePattern("  Breakout ")).toBe("breakout");
    expect(resolvePattern("MOMENTUM")).toBe("momentum");
  });

  it("falls back to decline", () => {
    expect(resolvePattern("")).toBe("decline");
    expect(resolvePattern("rocket")).toBe("decline");
  });
});
