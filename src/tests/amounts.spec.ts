import { expect } from "chai";
import { describe, it } from "mocha";
import { formatEther, parseEther } from "../utils/amounts";
import { serializeEvent } from "../utils/serialize";

describe("Amount helpers", () => {
  describe("parseEther", () => {
    it("converts decimal strings to wei without rounding", () => {
      expect(parseEther("2.3")).to.equal(2300000000000000000n);
      expect(parseEther("1")).to.equal(1000000000000000000n);
      expect(parseEther("0.000000000000000001")).to.equal(1n);
      expect(parseEther(" 5 ")).to.equal(5000000000000000000n);
    });

    it("rejects anything that is not a plain decimal", () => {
      expect(parseEther("")).to.equal(null);
      expect(parseEther("-1")).to.equal(null);
      expect(parseEther("1e18")).to.equal(null);
      expect(parseEther("1.")).to.equal(null);
      expect(parseEther("0.0000000000000000001")).to.equal(null);
    });
  });

  describe("formatEther", () => {
    it("trims trailing zeros", () => {
      expect(formatEther(2300000000000000000n)).to.equal("2.3");
      expect(formatEther(3000000000000000000n)).to.equal("3");
      expect(formatEther(1n)).to.equal("0.000000000000000001");
      expect(formatEther(0n)).to.equal("0");
    });
  });

  describe("serializeEvent", () => {
    it("writes bigint fields as decimal strings", () => {
      expect(
        serializeEvent({
          type: "claim",
          market_id: "m-1",
          account: "alice",
          amount: 2515142746913570550n,
        })
      ).to.deep.equal({
        type: "claim",
        market_id: "m-1",
        account: "alice",
        amount: "2515142746913570550",
      });
    });
  });
});
