import { describe, it, expect } from "vitest";
import { commissionFor, formatMoney, fromNumeric, isValidAmount, roundMoney } from "../core/money.js";

describe("money", () => {
  it("rounds to kopecks", () => {
    expect(roundMoney(0.1 + 0.2)).toBe(0.3);
    expect(roundMoney(1.005)).toBe(1.01);
    expect(roundMoney(83.3325)).toBe(83.33);
  });

  it("takes a quarter as commission", () => {
    expect(commissionFor(40000)).toBe(10000);
    expect(commissionFor(333.33)).toBe(83.33);
    expect(commissionFor(1000, 0.1)).toBe(100);
  });

  it("accepts positive amounts with at most two decimals", () => {
    expect(isValidAmount(500)).toBe(true);
    expect(isValidAmount(0.01)).toBe(true);
    expect(isValidAmount(0)).toBe(false);
    expect(isValidAmount(-1)).toBe(false);
    expect(isValidAmount(10.005)).toBe(false);
    expect(isValidAmount(Number.NaN)).toBe(false);
    expect(isValidAmount(Number.POSITIVE_INFINITY)).toBe(false);
  });

  it("reads NUMERIC columns", () => {
    expect(fromNumeric("5000.00")).toBe(5000);
    expect(fromNumeric("83.33")).toBe(83.33);
    expect(fromNumeric(null)).toBe(0);
  });

  it("formats roubles with grouped thousands", () => {
    expect(formatMoney(10000)).toBe("10 000.00₽");
    expect(formatMoney(1234567.5)).toBe("1 234 567.50₽");
    expect(formatMoney(500)).toBe("500.00₽");
    expect(formatMoney(-42.1)).toBe("-42.10₽");
  });
});
