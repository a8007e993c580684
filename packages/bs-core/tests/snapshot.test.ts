import { describe, it, expect } from "vitest";
import { OptionSnapshot } from "../src/snapshot";
import { InvalidParameterError } from "../src/errors";

// S=100, K=100, T=1, r=5%, sigma=20%
const atm = () => new OptionSnapshot(100, 100, 1, 0.05, 0.2);

describe("OptionSnapshot pricing", () => {
  it("prices the at-the-money one-year option", () => {
    const s = atm();
    expect(s.price("call")).toBeCloseTo(10.450583572185565, 9);
    expect(s.price("put")).toBeCloseTo(5.573526022256971, 9);
  });

  it("reproduces the headline dashboard figures", () => {
    const s = atm();
    expect(s.price("call")).toBeCloseTo(10.4506, 4);
    expect(s.price("put")).toBeCloseTo(5.5735, 4);
    expect(s.delta("call")).toBeCloseTo(0.6368, 4);
    expect(s.gamma()).toBeCloseTo(0.0188, 4);
    expect(s.vega()).toBeCloseTo(37.52, 2);
    expect(s.theta("call")).toBeCloseTo(-0.01757, 5);
    expect(s.rho("call")).toBeCloseTo(53.23, 2);
  });

  it("computes every Greek for both kinds", () => {
    const s = atm();
    expect(s.greeks("call")).toEqual({
      delta: expect.closeTo(0.6368306511756191, 12),
      gamma: expect.closeTo(0.018762017345846895, 12),
      vega: expect.closeTo(37.52403469169379, 9),
      theta: expect.closeTo(-0.01757267820941972, 12),
      rho: expect.closeTo(53.232481545376345, 9),
    });
    expect(s.greeks("put")).toEqual({
      delta: expect.closeTo(-0.3631693488243809, 12),
      gamma: expect.closeTo(0.018762017345846895, 12),
      vega: expect.closeTo(37.52403469169379, 9),
      theta: expect.closeTo(-0.004542138147766099, 12),
      rho: expect.closeTo(-41.89046090469506, 9),
    });
  });

  it("prices an out-of-the-money call", () => {
    const s = new OptionSnapshot(50, 60, 0.5, 0.03, 0.3);
    expect(s.price("call")).toBeCloseTo(1.409253373185619, 9);
    expect(s.price("put")).toBeCloseTo(10.515969749369383, 9);
  });

  it("prices an in-the-money short-dated call", () => {
    const s = new OptionSnapshot(120, 100, 0.25, 0.01, 0.4);
    expect(s.price("call")).toBeCloseTo(22.345370751704735, 9);
    expect(s.price("put")).toBeCloseTo(2.095682991450758, 9);
    expect(s.delta("call")).toBeCloseTo(0.8471078158922647, 12);
    expect(s.theta("put")).toBeCloseTo(-0.030493750950855235, 12);
    expect(s.rho("call")).toBeCloseTo(19.826891788841756, 9);
    expect(s.rho("put")).toBeCloseTo(-5.110686271094747, 9);
  });

  it("greek() dispatches by name and ignores kind for gamma and vega", () => {
    const s = atm();
    expect(s.greek("delta", "put")).toBe(s.delta("put"));
    expect(s.greek("theta", "call")).toBe(s.theta("call"));
    expect(s.greek("rho", "put")).toBe(s.rho("put"));
    expect(s.greek("gamma", "call")).toBe(s.greek("gamma", "put"));
    expect(s.greek("vega", "call")).toBe(s.greek("vega", "put"));
  });

  it("quote() bundles price and Greeks", () => {
    const q = atm().quote("put");
    expect(q.kind).toBe("put");
    expect(q.price).toBeCloseTo(5.573526022256971, 9);
    expect(q.greeks.delta).toBeCloseTo(-0.3631693488243809, 12);
  });
});

describe("OptionSnapshot d1/d2", () => {
  it("computes the standardized arguments once", () => {
    const s = atm();
    const terms = s.terms;
    expect(terms).not.toBeNull();
    expect(terms?.d1).toBeCloseTo(0.35, 12);
    expect(terms?.d2).toBeCloseTo(0.15, 12);
    expect(terms?.discount).toBeCloseTo(Math.exp(-0.05), 15);
    s.price("call");
    s.greeks("put");
    expect(s.terms).toBe(terms);
  });

  it("skips them at expiry", () => {
    const s = new OptionSnapshot(100, 100, 0, 0.05, 0.2);
    expect(s.terms).toBeNull();
    expect(s.expired).toBe(true);
  });
});

describe("OptionSnapshot at expiry (T = 0)", () => {
  it("pays intrinsic value exactly", () => {
    const s = new OptionSnapshot(110, 100, 0, 0.05, 0.2);
    expect(s.price("call")).toBe(10);
    expect(s.price("put")).toBe(0);
  });

  it("zeroes every Greek except delta", () => {
    const s = new OptionSnapshot(110, 100, 0, 0.05, 0.2);
    expect(s.delta("call")).toBe(1);
    expect(s.delta("put")).toBe(0);
    for (const kind of ["call", "put"] as const) {
      expect(s.gamma()).toBe(0);
      expect(s.vega()).toBe(0);
      expect(s.theta(kind)).toBe(0);
      expect(s.rho(kind)).toBe(0);
    }
  });

  it("uses the step deltas below and at the strike", () => {
    const below = new OptionSnapshot(90, 100, 0, 0.05, 0.2);
    expect(below.delta("call")).toBe(0);
    expect(below.delta("put")).toBe(-1);
    expect(below.price("put")).toBe(10);

    const at = new OptionSnapshot(100, 100, 0, 0.05, 0.2);
    expect(at.delta("call")).toBe(0);
    expect(at.delta("put")).toBe(0);
  });

  it("is continuous with T → 0+", () => {
    const itm = new OptionSnapshot(110, 100, 1e-8, 0.05, 0.2);
    expect(itm.price("call")).toBeCloseTo(10, 6);
    expect(itm.price("put")).toBeCloseTo(0, 6);
    const otm = new OptionSnapshot(90, 100, 1e-8, 0.05, 0.2);
    expect(otm.price("call")).toBeCloseTo(0, 6);
    expect(otm.price("put")).toBeCloseTo(10, 6);
  });
});

describe("OptionSnapshot validation", () => {
  const cases: Array<[string, () => OptionSnapshot, string]> = [
    ["zero vol", () => new OptionSnapshot(100, 100, 1, 0.05, 0), "volatility"],
    ["negative vol", () => new OptionSnapshot(100, 100, 1, 0.05, -0.2), "volatility"],
    ["zero spot", () => new OptionSnapshot(0, 100, 1, 0.05, 0.2), "underlyingPrice"],
    ["negative strike", () => new OptionSnapshot(100, -1, 1, 0.05, 0.2), "strikePrice"],
    ["negative maturity", () => new OptionSnapshot(100, 100, -0.1, 0.05, 0.2), "timeToMaturity"],
    ["NaN rate", () => new OptionSnapshot(100, 100, 1, NaN, 0.2), "riskFreeRate"],
    ["infinite spot", () => new OptionSnapshot(Infinity, 100, 1, 0.05, 0.2), "underlyingPrice"],
  ];

  it.each(cases)("rejects %s", (_label, build, parameter) => {
    expect(build).toThrow(InvalidParameterError);
    try {
      build();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidParameterError);
      expect(err instanceof InvalidParameterError && err.parameter).toBe(parameter);
    }
  });

  it("accepts a negative rate", () => {
    const s = new OptionSnapshot(100, 100, 1, -0.01, 0.2);
    expect(Number.isFinite(s.price("call"))).toBe(true);
  });

  it("rejects an unknown kind from untyped callers", () => {
    const s = atm();
    expect(() => Reflect.apply(s.price, s, ["straddle"])).toThrow(InvalidParameterError);
    expect(() => Reflect.apply(s.greek, s, ["speed", "call"])).toThrow(InvalidParameterError);
  });
});

describe("OptionSnapshot immutability", () => {
  it("is frozen", () => {
    const s = atm();
    expect(Object.isFrozen(s)).toBe(true);
    expect(Object.isFrozen(s.terms)).toBe(true);
  });

  it("with() returns a fresh validated snapshot", () => {
    const s = atm();
    const bumped = s.with({ volatility: 0.3 });
    expect(bumped).not.toBe(s);
    expect(bumped.volatility).toBe(0.3);
    expect(s.volatility).toBe(0.2);
    expect(bumped.price("call")).toBeGreaterThan(s.price("call"));
    expect(() => s.with({ volatility: 0 })).toThrow(InvalidParameterError);
  });

  it("round-trips through create()", () => {
    const s = atm();
    expect(OptionSnapshot.create(s.toInputs()).price("call")).toBe(s.price("call"));
  });
});
