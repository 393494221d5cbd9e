import { describe, test, expect } from "vitest";
import { MessageLog } from "./message_log.js";
import { decodeProbeMap, emptyProbeMap } from "./probe_map.js";
import { type SubsystemShape, makeSubsystem } from "./test_support.js";

const base: SubsystemShape = { mode: "NATIVE", cores: 2, noProbes: 3, probesSum: 14, widths: [4, 8, 2], packed: [0x21n, 0x3n] };

function decode(shape: Partial<SubsystemShape>) {
  const log = new MessageLog();
  return { result: decodeProbeMap(makeSubsystem({ ...base, ...shape }), log), log };
}

describe("decodeProbeMap", () => {
  test("places probes at the running width of their interface", () => {
    const { result } = decode({});
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.map.calculatedCoreWidth.slice(0, 3)).toEqual([12, 2, 0]);
    expect(result.map.probeToCore.slice(0, 4)).toEqual([{ core: 0, offset: 0 }, { core: 0, offset: 4 }, { core: 1, offset: 0 }, undefined]);
    expect(result.map.probeOrder.slice(0, 3)).toEqual([[0, 1], [2], []]);
  });

  test("a probe claimed twice is rejected", () => {
    const { result, log } = decode({ packed: [0x21n, 0x1n] });
    expect(result.ok).toBe(false);
    expect(log.errors()).toEqual(["Error: Duplicated Probe 1 found in IF2_Probes"]);
  });

  test("every native interface needs probes", () => {
    const { log } = decode({ packed: [0x321n] });
    expect(log.errors()).toEqual(["Error: IF2_Probes must not be zero"]);
  });

  test("interfaces past the native cores must be empty", () => {
    const { log } = decode({ packed: [0x21n, 0x3n, 0x3n] });
    expect(log.errors()).toEqual(["Error: IF3_Probes must be zero but found 0x0000000000000003"]);
  });

  test("probe numbers are bounded by No_Probes", () => {
    const { log } = decode({ packed: [0x21n, 0x4n] });
    expect(log.errors()).toEqual(["Error: IF2_Probes refers to invalid probe 4 (expect 1..3)"]);
  });

  test("a mapped probe needs a width", () => {
    const { log } = decode({ widths: [4, 0, 2] });
    expect(log.errors()).toEqual(["Error: IF1_Probes refers to probe 2 but Probe2_Width is zero"]);
  });

  test("every declared probe must be mapped", () => {
    const { log } = decode({ noProbes: 4, widths: [4, 8, 2, 1] });
    expect(log.errors()).toEqual(["Error: 3 probe(s) are assigned but No_Probes is 4"]);
  });

  test("the AXI bridge interface owns nothing", () => {
    const { result } = decode({ mode: "NATIVE_AXI", axiType: "AXI4", noAxiBus: 1, packed: [0x321n] });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.map.calculatedCoreWidth.slice(0, 2)).toEqual([14, 0]);
    expect(result.map.probeOrder[0]).toEqual([0, 1, 2]);
  });
});

test("emptyProbeMap covers every interface", () => {
  const map = emptyProbeMap();
  expect(map.probeOrder).toHaveLength(15);
  expect(map.calculatedCoreWidth.every((w) => w === 0)).toBe(true);
});
