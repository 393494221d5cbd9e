import { describe, test, expect } from "vitest";
import { MessageLog } from "./message_log.js";
import { sanityCheck } from "./sanity_check.js";
import { type RawParams, type SubsystemShape, coreParams, makeCore, makeSubsystem } from "./test_support.js";

const SS = "ocla_debug_subsystem";

const nativeShape: SubsystemShape = {
  mode: "NATIVE",
  cores: 2,
  noProbes: 3,
  probesSum: 14,
  widths: [4, 8, 2],
  packed: [0x21n, 0x3n],
};

function run(shape: Partial<SubsystemShape>, cores: RawParams[], instantiators = cores.map(() => SS)) {
  const log = new MessageLog();
  const s = makeSubsystem({ ...nativeShape, ...shape });
  const built = cores.map((p, i) => makeCore(`core${i}`, p));
  const ok = sanityCheck(s, built, instantiators, log);
  return { ok, s, cores: built, log };
}

const twoCores = (): RawParams[] => [coreParams(0, 12), coreParams(1, 2)];

describe("sanityCheck", () => {
  test("accepts a consistent native subsystem", () => {
    const { ok, s, cores, log } = run({}, twoCores());
    expect(log.errors()).toEqual([]);
    expect(ok).toBe(true);
    expect(s.mapping?.calculatedCoreWidth.slice(0, 2)).toEqual([12, 2]);
    expect(cores.map((c) => [c.probeOrder, c.baseAddress, c.isAxiBridge])).toEqual([
      [[0, 1], 0x1000, false],
      [[2], 0x2000, false],
    ]);
  });

  test("every core needs an instantiator", () => {
    const { ok, log } = run({}, twoCores(), [SS]);
    expect(ok).toBe(false);
    expect(log.errors()).toEqual(["Error: Not all the OCLA module (count=2) found the instantiator (count=1)"]);
  });

  test("core count must match Cores", () => {
    const { log } = run({}, [coreParams(0, 12)]);
    expect(log.errors()).toEqual([
      "Error: OCLA Debug Subsystem parameter Cores=2 does not match with detected OCLA module count=1",
    ]);
  });

  test("INDEX must count up from zero", () => {
    const { log } = run({}, [coreParams(0, 12), coreParams(2, 2)]);
    expect(log.errors()).toEqual(["Error: Module core1 has unexpected INDEX, expectation=1, but found 2"]);
  });

  test("cores must be instantiated by the subsystem", () => {
    const { log } = run({}, twoCores(), [SS, "other_wrapper"]);
    expect(log.errors()).toEqual(["Error: Found unexpected instantiator: other_wrapper"]);
  });

  test("identity parameters must agree", () => {
    const { log } = run({}, [coreParams(0, 12), coreParams(1, 2, { IP_ID: 255 })]);
    expect(log.errors()).toEqual([
      "Error: Module core1 has mismatch parameter IP_TYPE=OCLA, IP_VERSION=0x00000001, IP_ID=0x000000FF",
    ]);
  });

  test("AXI widths must agree", () => {
    const { log } = run({}, [coreParams(0, 12), coreParams(1, 2, { AXI_DATA_WIDTH: 64 })]);
    expect(log.errors()).toEqual(["Error: Module core1 has mismatch parameter AXI_ADDR_WIDTH=32, AXI_DATA_WIDTH=64"]);
  });

  test("a duplicated probe stops the check before any mapping is stored", () => {
    const { ok, s, log } = run({ packed: [0x21n, 0x1n] }, twoCores());
    expect(ok).toBe(false);
    expect(log.has("Duplicated Probe 1")).toBe(true);
    expect(s.mapping).toBeUndefined();
  });

  test("NO_OF_PROBES must match the mapped width", () => {
    const { log } = run({}, [coreParams(0, 11), coreParams(1, 2)]);
    expect(log.errors()).toEqual(["Error: Module core0 has mismatch parameter NO_OF_PROBES=11, mapped width of IF1=12"]);
  });

  test("Probes_Sum is checked against declared widths", () => {
    const { log } = run({ probesSum: 15 }, twoCores());
    expect(log.errors()).toEqual(["Error: Probes_Sum by declared widths (14) does not match with definition (15)"]);
  });

  test("Probes_Sum is checked against mapped widths", () => {
    const { log } = run({ probesSum: 15, widths: [4, 8, 2, 1] }, twoCores());
    expect(log.errors()).toEqual(["Error: Probes_Sum by mapped widths (14) does not match with definition (15)"]);
  });

  test("base addresses must be distinct", () => {
    const { log } = run({ baseAddresses: [0x100, 0x100] }, twoCores());
    expect(log.errors()).toEqual(["Error: Module core1 has conflict base address 0x00000100"]);
  });

  test("the probe map is decoded once", () => {
    const { s, cores } = run({}, twoCores());
    expect(() => sanityCheck(s, cores, [SS, SS], new MessageLog())).toThrow("already decoded");
  });
});

describe("sanityCheck with an AXI bridge", () => {
  const axiShape: Partial<SubsystemShape> = {
    mode: "AXI",
    axiType: "AXILite",
    noAxiBus: 2,
    cores: 1,
    noProbes: 0,
    probesSum: 304,
    widths: [],
    packed: [],
  };

  test("bridge width follows the bus count", () => {
    const { ok, cores, log } = run(axiShape, [coreParams(0, 304)]);
    expect(log.errors()).toEqual([]);
    expect(ok).toBe(true);
    expect(cores[0].isAxiBridge).toBe(true);
  });

  test("bridge NO_OF_PROBES is checked", () => {
    const { log } = run(axiShape, [coreParams(0, 152)]);
    expect(log.errors()).toEqual([
      "Error: AXI bridge module core0 has NO_OF_PROBES=152 (expect 304 for 2 AXILite bus) and mapped width 0",
    ]);
  });

  test("native cores share the subsystem with the bridge", () => {
    const { ok, cores } = run(
      { mode: "NATIVE_AXI", axiType: "AXI4", noAxiBus: 1, packed: [0x321n], probesSum: 14 + 250 },
      [coreParams(0, 14), coreParams(1, 250)],
    );
    expect(ok).toBe(true);
    expect(cores.map((c) => c.isAxiBridge)).toEqual([false, true]);
    expect(cores[0].probeOrder).toEqual([0, 1, 2]);
  });
});
