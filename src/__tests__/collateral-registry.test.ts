import { CollateralRegistry } from "../collateral-registry";
import { ValidationError } from "../errors";
import { captureError } from "./fixtures";

describe("CollateralRegistry", () => {
  describe("construction", () => {
    it("should reject asset and feed lists of different lengths", () => {
      expect(() => new CollateralRegistry(["WETH", "WBTC"], ["ETH/USD"])).toThrow(ValidationError);
      const err = captureError(() => new CollateralRegistry(["WETH"], []));
      expect(err).toBeInstanceOf(ValidationError);
      expect(err).toMatchObject({ category: "ValidationError", code: "LengthMismatch" });
    });

    it("should reject a duplicate asset", () => {
      expect(() => new CollateralRegistry(["WETH", "WETH"], ["A", "B"])).toThrow("registered twice");
    });

    it("should reject an empty asset id", () => {
      expect(() => new CollateralRegistry([""], ["A"])).toThrow("index 0 is empty");
    });

    it("should accept an empty registry", () => {
      expect(new CollateralRegistry([], []).enumerate()).toEqual([]);
    });
  });

  describe("queries", () => {
    const registry = new CollateralRegistry(["WETH", "WBTC", "LINK"], ["ETH/USD", "BTC/USD", "LINK/USD"]);

    it("should enumerate in registration order", () => {
      expect(registry.enumerate()).toEqual(["WETH", "WBTC", "LINK"]);
    });

    it("should not let callers reorder the enumeration", () => {
      const order = registry.enumerate();
      expect(Object.isFrozen(order)).toBe(true);
    });

    it("should answer isAllowed", () => {
      expect(registry.isAllowed("WBTC")).toBe(true);
      expect(registry.isAllowed("DOGE")).toBe(false);
    });

    it("should map each asset to its feed", () => {
      expect(registry.priceFeedOf("LINK")).toBe("LINK/USD");
      expect(registry.priceFeedOf("DOGE")).toBeUndefined();
    });

    it("should throw TokenNotAllowed from requireAllowed", () => {
      expect(registry.requireAllowed("WETH")).toBe("ETH/USD");
      expect(() => registry.requireAllowed("DOGE")).toThrow("not allowed as collateral");
    });
  });
});
