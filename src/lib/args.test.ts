import { describe, expect, it } from "vitest";
import { parseArgs, positionalArgs } from "./args.js";

const argv = (...rest: string[]) => ["node", "script", ...rest];

describe("parseArgs", () => {
  it("pairs flags with their values", () => {
    const args = parseArgs(argv("--tiles", "boards/a.json", "--top", "5"));
    expect(args.get("--tiles")).toBe("boards/a.json");
    expect(args.get("--top")).toBe("5");
  });

  it("treats a flag without a value as true", () => {
    const args = parseArgs(argv("--include-coast", "--bonus", "1", "--verbose"));
    expect(args.get("--include-coast")).toBe("true");
    expect(args.get("--bonus")).toBe("1");
    expect(args.get("--verbose")).toBe("true");
  });
});

describe("positionalArgs", () => {
  it("skips flags and their values", () => {
    expect(positionalArgs(argv("board.json", "--top", "3", "other.json", "--json"))).toEqual(["board.json", "other.json"]);
  });
});
