import { describe, expect, it } from "vitest";
import { shellJoin, shellQuote } from "./shell-quote.ts";

describe("shellQuote", () => {
  it("leaves plain tokens alone", () => {
    expect(shellQuote("--learning_rate")).toBe("--learning_rate");
    expect(shellQuote("5e-5")).toBe("5e-5");
    expect(shellQuote("q_proj,v_proj")).toBe("q_proj,v_proj");
  });

  it("quotes spaces and shell metacharacters", () => {
    expect(shellQuote("a b")).toBe("'a b'");
    expect(shellQuote("$HOME")).toBe("'$HOME'");
    expect(shellQuote("")).toBe("''");
  });

  it("escapes embedded single quotes", () => {
    expect(shellQuote("can't")).toBe("'can'\\''t'");
  });
});

describe("shellJoin", () => {
  it("joins with single spaces", () => {
    expect(shellJoin(["--epochs", "3", "--tag", "v1 final"])).toBe(
      "--epochs 3 --tag 'v1 final'",
    );
  });
});
