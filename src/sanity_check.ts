import { axiBusWidth } from "./axi_signals.js";
import { type CoreInstance, type DebugSubsystem, type ProbeMap, axiBridgeIndex } from "./ip.js";
import { MessageLog } from "./message_log.js";
import { decodeProbeMap, emptyProbeMap } from "./probe_map.js";
import { MAX_INTERFACES, die, hex32 } from "./util.js";

type CheckContext = {
  s: DebugSubsystem;
  cores: CoreInstance[];
  instantiators: string[];
  log: MessageLog;
};

type Check = (ctx: CheckContext) => boolean;

function checkInstantiatorCount({ cores, instantiators, log }: CheckContext): boolean {
  if (cores.length === instantiators.length) return true;
  log.post(1, `Error: Not all the OCLA module (count=${cores.length}) found the instantiator (count=${instantiators.length})`);
  return false;
}

function checkCoreCount({ s, cores, log }: CheckContext): boolean {
  if (s.coreCount === cores.length) return true;
  log.post(1, `Error: OCLA Debug Subsystem parameter Cores=${s.coreCount} does not match with detected OCLA module count=${cores.length}`);
  return false;
}

function checkIndexSequence({ s, cores, log }: CheckContext): boolean {
  log.post(1, `Check module parameter INDEX sequence, must be 0 .. ${s.coreCount - 1}`);
  let ok = true;
  cores.forEach((c, sequence) => {
    if (c.index !== sequence) {
      log.post(2, `Error: Module ${c.name} has unexpected INDEX, expectation=${sequence}, but found ${c.index}`);
      ok = false;
    }
  });
  return ok;
}

function checkInstantiatorName({ s, instantiators, log }: CheckContext): boolean {
  log.post(1, `All modules should be instantiated by ${s.name}`);
  const strangers = instantiators.filter((n) => n !== s.name);
  for (const n of strangers) log.post(2, `Error: Found unexpected instantiator: ${n}`);
  return strangers.length === 0;
}

function checkIdentity({ s, cores, log }: CheckContext): boolean {
  log.post(1, `Parameter IP_TYPE=${s.type}, IP_VERSION=${hex32(s.version)}, IP_ID=${hex32(s.id)} must match`);
  let ok = true;
  for (const c of cores) {
    if (c.type !== s.type || c.version !== s.version || c.id !== s.id) {
      log.post(
        2,
        `Error: Module ${c.name} has mismatch parameter IP_TYPE=${c.type}, IP_VERSION=${hex32(c.version)}, IP_ID=${hex32(c.id)}`,
      );
      ok = false;
    }
  }
  return ok;
}

function checkAxiWidths({ cores, log }: CheckContext): boolean {
  const { axiAddrWidth, axiDataWidth } = cores[0];
  log.post(1, `Parameter AXI_ADDR_WIDTH=${axiAddrWidth}, AXI_DATA_WIDTH=${axiDataWidth} must match`);
  let ok = true;
  for (const c of cores) {
    if (c.axiAddrWidth !== axiAddrWidth || c.axiDataWidth !== axiDataWidth) {
      log.post(2, `Error: Module ${c.name} has mismatch parameter AXI_ADDR_WIDTH=${c.axiAddrWidth}, AXI_DATA_WIDTH=${c.axiDataWidth}`);
      ok = false;
    }
  }
  return ok;
}

function checkProbeMap({ s, cores, log }: CheckContext): boolean {
  log.post(1, "Parameter IF[n]_Probes must map every probe to one core");
  let map: ProbeMap;
  if (s.mode === "AXI") {
    map = emptyProbeMap();
  } else {
    const decoded = decodeProbeMap(s, log);
    if (!decoded.ok) return false;
    map = decoded.map;
  }
  if (s.mapping) die(`probe map of ${s.name} is already decoded`);
  s.mapping = map;
  const axi = axiBridgeIndex(s);
  for (const c of cores) {
    c.isAxiBridge = c.index === axi;
    c.probeOrder = [...map.probeOrder[c.index]];
  }
  return true;
}

function mappingOf(s: DebugSubsystem): ProbeMap {
  return s.mapping ?? die(`probe map of ${s.name} has not been decoded`);
}

function axiCoreWidth(s: DebugSubsystem): number {
  const axiType = s.axiType ?? die(`subsystem ${s.name} in ${s.mode} mode has no AXI type`);
  return s.noAxiBus * axiBusWidth(axiType);
}

function checkCoreWidths({ s, cores, log }: CheckContext): boolean {
  log.post(1, "Parameter NO_OF_PROBES must match the mapped probe widths");
  const { calculatedCoreWidth } = mappingOf(s);
  let ok = true;
  for (const c of cores) {
    const calculated = calculatedCoreWidth[c.index];
    if (c.isAxiBridge) {
      const expected = axiCoreWidth(s);
      if (c.probeCount !== expected || calculated !== 0) {
        log.post(
          2,
          `Error: AXI bridge module ${c.name} has NO_OF_PROBES=${c.probeCount} (expect ${expected} for ${s.noAxiBus} ${s.axiType} bus) and mapped width ${calculated}`,
        );
        ok = false;
      }
    } else if (c.probeCount !== calculated) {
      log.post(2, `Error: Module ${c.name} has mismatch parameter NO_OF_PROBES=${c.probeCount}, mapped width of IF${c.index + 1}=${calculated}`);
      ok = false;
    }
  }
  return ok;
}

function checkUnusedInterfaces({ s, log }: CheckContext): boolean {
  if (s.coreCount >= MAX_INTERFACES) return true;
  log.post(1, `Unused IF[${s.coreCount + 1}..${MAX_INTERFACES}] must be null`);
  const { calculatedCoreWidth } = mappingOf(s);
  let ok = true;
  for (let i = s.coreCount; i < MAX_INTERFACES; i++) {
    if (calculatedCoreWidth[i] !== 0) {
      log.post(2, `Error: IF${i + 1} is not null (width=${calculatedCoreWidth[i]})`);
      ok = false;
    }
  }
  return ok;
}

function checkProbesSum({ s, cores, log }: CheckContext): boolean {
  log.post(1, "Parameter Probes_Sum must match");
  const axiCore = cores.find((c) => c.isAxiBridge);
  const axiExtra = s.mode !== "NATIVE" && axiCore ? axiCore.probeCount : 0;
  const declared = s.interfaces.reduce((sum, itf) => sum + itf.probeWidth, 0) + axiExtra;
  if (declared !== s.probesSum) {
    log.post(2, `Error: Probes_Sum by declared widths (${declared}) does not match with definition (${s.probesSum})`);
    return false;
  }
  const calculated = mappingOf(s).calculatedCoreWidth.reduce((sum, w) => sum + w, 0) + axiExtra;
  if (calculated !== s.probesSum) {
    log.post(2, `Error: Probes_Sum by mapped widths (${calculated}) does not match with definition (${s.probesSum})`);
    return false;
  }
  return true;
}

function checkBaseAddresses({ s, cores, log }: CheckContext): boolean {
  log.post(1, `Parameter IF[1..${cores.length}]_BaseAddress must not conflict`);
  const seen = new Set<number>();
  let ok = true;
  for (const c of cores) {
    c.baseAddress = s.interfaces[c.index].baseAddress;
    if (seen.has(c.baseAddress)) {
      log.post(2, `Error: Module ${c.name} has conflict base address ${hex32(c.baseAddress)}`);
      ok = false;
    } else {
      log.post(2, `Module ${c.name} has base address ${hex32(c.baseAddress)}`);
      seen.add(c.baseAddress);
    }
  }
  return ok;
}

const ORDERED_CHECKS: Check[] = [
  checkInstantiatorCount,
  checkCoreCount,
  checkIndexSequence,
  checkInstantiatorName,
  checkIdentity,
  checkAxiWidths,
  checkProbeMap,
  checkCoreWidths,
  checkUnusedInterfaces,
  checkProbesSum,
  checkBaseAddresses,
];

/**
 * Cross-checks the subsystem against its cores. Stops at the first failing
 * check; everything logged up to that point stays in the log.
 */
export function sanityCheck(s: DebugSubsystem, cores: CoreInstance[], instantiators: string[], log: MessageLog): boolean {
  log.post(0, "Sanity Check");
  if (cores.length === 0) die("sanity check needs at least one OCLA module");
  const ctx: CheckContext = { s, cores, instantiators, log };
  return ORDERED_CHECKS.every((check) => check(ctx));
}
