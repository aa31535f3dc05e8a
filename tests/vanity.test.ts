import { describe, it, expect, vi, afterEach } from "vitest";
import { Keypair } from "@solana/web3.js";
import {
  estimateAttempts,
  findVanityKeypair,
  validatePrefix,
} from "../src/utils/vanity";
import { ConfigError } from "../src/core/errors";

function seeded(n: number): Keypair {
  return Keypair.fromSeed(new Uint8Array(32).fill(n));
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("findVanityKeypair", () => {
  it("returns the key on the iteration that matched", () => {
    const keys = [seeded(1), seeded(2), seeded(3)];
    const target = keys[1]!;
    let i = 0;
    const generate = vi.fn(() => keys[i++]!);

    const result = findVanityKeypair({
      prefix: target.publicKey.toBase58(),
      maxMinutes: 1,
      generate,
    });

    expect(result.found).toBe(true);
    if (result.found) {
      expect(result.keypair).toBe(target);
      expect(result.address).toBe(target.publicKey.toBase58());
      expect(result.attempts).toBe(2);
    }
    expect(generate).toHaveBeenCalledTimes(2);
  });

  it("stops once the budget is used up", () => {
    const key = seeded(4);
    const address = key.publicKey.toBase58();
    const prefix = (address[0] === "z" ? "y" : "z") + "zz";
    let clock = 0;
    const now = () => {
      const t = clock;
      clock += 30_000;
      return t;
    };

    const result = findVanityKeypair({
      prefix,
      maxMinutes: 1,
      generate: () => key,
      now,
    });

    expect(result).toEqual({
      found: false,
      prefix,
      maxMinutes: 1,
      attempts: 1,
      elapsedMs: 60_000,
    });
  });

  it("reports a timeout without generating when the budget is zero", () => {
    const generate = vi.fn(() => Keypair.generate());

    const result = findVanityKeypair({ prefix: "AAA", maxMinutes: 0, generate });

    expect(result.found).toBe(false);
    expect(result.attempts).toBe(0);
    expect(generate).not.toHaveBeenCalled();
  });

  it("ends within the wall-clock budget with real keys", () => {
    const started = performance.now();

    const result = findVanityKeypair({
      prefix: "zzzzzzzzzz",
      maxMinutes: 0.0005,
    });

    const wall = performance.now() - started;
    expect(result.found).toBe(false);
    expect(result.elapsedMs).toBeGreaterThanOrEqual(30);
    expect(wall).toBeLessThan(1_030);
  });

  it("keeps its budget when the system clock steps backward", () => {
    let reads = 0;
    let wall = 1_700_000_000_000;
    vi.spyOn(Date, "now").mockImplementation(() => {
      reads++;
      wall += reads === 2 ? -600_000 : 1_000;
      return wall;
    });
    const started = performance.now();

    const result = findVanityKeypair({
      prefix: "zzzzzzzzzz",
      maxMinutes: 0.0005,
    });

    expect(result.found).toBe(false);
    expect(result.elapsedMs).toBeGreaterThanOrEqual(30);
    expect(performance.now() - started).toBeLessThan(1_030);
  });

  it("rejects prefixes outside the Base58 alphabet", () => {
    expect(() => validatePrefix("0ab")).toThrow(ConfigError);
    expect(() => validatePrefix("")).toThrow(/must not be empty/);
    expect(() =>
      findVanityKeypair({ prefix: "Il", maxMinutes: 1 })
    ).toThrow(ConfigError);
  });

  it("rejects a negative budget", () => {
    expect(() => findVanityKeypair({ prefix: "A", maxMinutes: -1 })).toThrow(
      ConfigError
    );
  });

  it("estimates 58^n attempts", () => {
    expect(estimateAttempts("AB")).toBe(3364);
    expect(estimateAttempts("Lev")).toBe(195112);
  });
});
