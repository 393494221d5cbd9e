import { describe, test, expect } from "vitest";
import { MessageLog } from "./message_log.js";
import {
  CORE_SLOTS,
  SUBSYSTEM_SLOTS,
  type ParamValue,
  decodeCandidate,
  decodeParamLiteral,
  encodeParamLiteral,
  formatParamValue,
  strParam,
  u32Param,
} from "./param_schema.js";
import { coreParams, paramEntries } from "./test_support.js";

describe("decodeParamLiteral", () => {
  test("decimal and sized binary integers", () => {
    expect(decodeParamLiteral("u32", "42")).toEqual({ ok: true, value: { kind: "u32", value: 42 } });
    expect(decodeParamLiteral("u32", "4'0101")).toEqual({ ok: true, value: { kind: "u32", value: 5 } });
    expect(decodeParamLiteral("u64", "18446744073709551615")).toEqual({
      ok: true,
      value: { kind: "u64", value: 18446744073709551615n },
    });
  });

  test("rejects malformed or oversized integers", () => {
    expect(decodeParamLiteral("u32", "4294967296").ok).toBe(false);
    expect(decodeParamLiteral("u32", `33'1${"0".repeat(32)}`).ok).toBe(false);
    expect(decodeParamLiteral("u32", "3'0101").ok).toBe(false);
    expect(decodeParamLiteral("u32", "0'").ok).toBe(false);
    expect(decodeParamLiteral("u32", "-1").ok).toBe(false);
    expect(decodeParamLiteral("u32", "0x10").ok).toBe(false);
    expect(decodeParamLiteral("u32", "4'01x1").ok).toBe(false);
  });

  test("strings must be quoted and are unescaped", () => {
    expect(decodeParamLiteral("str", '"OCLA"')).toEqual({ ok: true, value: { kind: "str", value: "OCLA" } });
    expect(decodeParamLiteral("str", '"a\\"b\\\\c"')).toEqual({ ok: true, value: { kind: "str", value: 'a"b\\c' } });
    expect(decodeParamLiteral("str", '"\\101\\n"')).toEqual({ ok: true, value: { kind: "str", value: "A\n" } });
    expect(decodeParamLiteral("str", "OCLA").ok).toBe(false);
    expect(decodeParamLiteral("str", '"').ok).toBe(false);
  });
});

describe("encodeParamLiteral", () => {
  test("renders each kind", () => {
    expect(encodeParamLiteral({ kind: "u32", value: 7 })).toBe("7");
    expect(encodeParamLiteral({ kind: "str", value: 'say "hi"\t' })).toBe('"say \\"hi\\"\\t"');
    expect(encodeParamLiteral({ kind: "u64", value: 5n })).toBe(`64'${"0".repeat(61)}101`);
  });

  test("decoding an encoded value gives the value back", () => {
    const values: ParamValue[] = [
      { kind: "u32", value: 0 },
      { kind: "u32", value: 4294967295 },
      { kind: "u64", value: 0x8000000000000001n },
      { kind: "str", value: "line\nwith \\ and \u0001" },
    ];
    for (const v of values) {
      expect(decodeParamLiteral(v.kind, encodeParamLiteral(v))).toEqual({ ok: true, value: v });
    }
  });
});

test("formatParamValue shows integers in decimal and hex", () => {
  expect(formatParamValue({ kind: "u32", value: 255 })).toBe("255 (0x000000FF)");
  expect(formatParamValue({ kind: "u64", value: 0x21n })).toBe("33 (0x0000000000000021)");
  expect(formatParamValue({ kind: "str", value: "AXI4" })).toBe("AXI4");
});

describe("decodeCandidate", () => {
  test("assigns every slot and ignores unknown parameters", () => {
    const log = new MessageLog();
    const table = decodeCandidate(CORE_SLOTS, [...paramEntries(coreParams(3, 8)), ["EXTRA", "1"]], log);
    expect(table).toBeDefined();
    if (!table) return;
    expect(u32Param(table, "INDEX")).toBe(3);
    expect(u32Param(table, "NO_OF_PROBES")).toBe(8);
    expect(strParam(table, "IP_TYPE")).toBe("OCLA");
    expect(log.lines()).toContain("  Ignore param EXTRA");
    expect(log.lines()).toContain("  Param MEM_DEPTH - 1024 (0x00000400)");
  });

  test("a parameter given twice discards the candidate", () => {
    const log = new MessageLog();
    const table = decodeCandidate(CORE_SLOTS, [...paramEntries(coreParams(0, 1)), ["INDEX", "1"]], log);
    expect(table).toBeUndefined();
    expect(log.errors()).toEqual(["Error: Param INDEX had been assigned"]);
  });

  test("a value of the wrong format discards the candidate", () => {
    const log = new MessageLog();
    const table = decodeCandidate(CORE_SLOTS, paramEntries(coreParams(0, 1, { NO_OF_PROBES: "abc" })), log);
    expect(table).toBeUndefined();
    expect(log.errors()).toEqual(['Error: Param NO_OF_PROBES value "abc" does not follow uint32_t format']);
  });

  test("every missing slot is reported", () => {
    const log = new MessageLog();
    const entries = paramEntries(coreParams(0, 1)).filter(([k]) => k !== "MEM_DEPTH" && k !== "INDEX");
    expect(decodeCandidate(CORE_SLOTS, entries, log)).toBeUndefined();
    expect(log.errors()).toEqual(["Error: missing parameter MEM_DEPTH", "Error: missing parameter INDEX"]);
  });

  test("subsystem schema has one width, address and probe set per interface", () => {
    expect(SUBSYSTEM_SLOTS).toHaveLength(9 + 15 * 3);
    expect(SUBSYSTEM_SLOTS.find((s) => s.key === "IF15_Probes")?.kind).toBe("u64");
  });

  test("typed getters refuse a slot of another kind", () => {
    const table = decodeCandidate(CORE_SLOTS, paramEntries(coreParams(0, 1)), new MessageLog());
    expect(table).toBeDefined();
    if (!table) return;
    expect(() => u32Param(table, "IP_TYPE")).toThrow("not a decoded uint32");
  });
});
