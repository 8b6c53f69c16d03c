import { describe, it } from "mocha";
import { expect } from "chai";

import { hammingDistance } from "../src/metrics/hamming.js";

describe("metrics hamming distance", () => {
  it("counts differing positions", () => {
    expect(hammingDistance("cat", "cot")).to.equal(1);
    expect(hammingDistance("abcd", "wxyz")).to.equal(4);
    expect(hammingDistance("same", "same")).to.equal(0);
    expect(hammingDistance("", "")).to.equal(0);
  });

  it("stops counting one past the limit", () => {
    expect(hammingDistance("abcd", "wxyz", 1)).to.equal(2);
    expect(hammingDistance("abcd", "abyz", 2)).to.equal(2);
    expect(hammingDistance("abcd", "wxyz", 0)).to.equal(1);
  });

  it("treats accented letters as single positions", () => {
    expect(hammingDistance("pão", "pau")).to.equal(2);
  });

  it("refuses words of different lengths", () => {
    expect(() => hammingDistance("cat", "cats")).to.throw(RangeError, "lengths differ");
  });
});
