import {describe, it, expect} from "vitest";
import {Err, Result, isErr} from "../../../src/util/index.js";

describe("Result Err", () => {
  function getResult(fail: boolean): Result<number | null, string> {
    return fail ? Err("failed") : null;
  }

  it("should detect an Err", () => {
    const result = getResult(true);
    if (!isErr(result)) {
      throw Error("Expected Err");
    }
    expect(result.error).toBe("failed");
  });

  it("should not confuse null or plain objects with an Err", () => {
    expect(isErr(getResult(false))).toBe(false);
    expect(isErr<{error: string}, string>({error: "not an err"})).toBe(false);
    expect(isErr<number, string>(0)).toBe(false);
  });
});
