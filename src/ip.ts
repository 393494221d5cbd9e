import { MessageLog } from "./message_log.js";
import { type ParamTable, baseAddressKey, packedProbesKey, probeWidthKey, strParam, u32Param, u64Param } from "./param_schema.js";
import type { SignalFragment } from "./signal.js";
import { MAX_INTERFACES } from "./util.js";

export type SubsystemMode = "NATIVE" | "AXI" | "NATIVE_AXI";
export type AxiType = "AXI4" | "AXILite";

const MODES: readonly SubsystemMode[] = ["NATIVE", "AXI", "NATIVE_AXI"];
const AXI_TYPES: readonly AxiType[] = ["AXI4", "AXILite"];

export type CoreInstance = {
  kind: "core";
  name: string;
  params: ParamTable;
  type: string;
  version: number;
  id: number;
  index: number;
  memDepth: number;
  probeCount: number;
  axiAddrWidth: number;
  axiDataWidth: number;
  baseAddress: number;
  isAxiBridge: boolean;
  probeOrder: number[];
  probes: SignalFragment[];
};

export type InterfaceSlot = {
  probeWidth: number;
  baseAddress: number;
  packedProbes: bigint;
};

export type ProbeOwner = { core: number; offset: number };

export type ProbeMap = {
  probeOrder: number[][];
  probeToCore: Array<ProbeOwner | undefined>;
  calculatedCoreWidth: number[];
};

export type DebugSubsystem = {
  kind: "subsystem";
  name: string;
  params: ParamTable;
  type: string;
  version: number;
  id: number;
  mode: SubsystemMode;
  axiType?: AxiType;
  noAxiBus: number;
  coreCount: number;
  totalProbeCount: number;
  probesSum: number;
  interfaces: InterfaceSlot[];
  /** Set once by the probe map decoder. */
  mapping?: ProbeMap;
};

function isMode(s: string): s is SubsystemMode {
  return (MODES as readonly string[]).includes(s);
}

function isAxiType(s: string): s is AxiType {
  return (AXI_TYPES as readonly string[]).includes(s);
}

export function buildCore(name: string, params: ParamTable, ipType: string, log: MessageLog): CoreInstance | undefined {
  const core: CoreInstance = {
    kind: "core",
    name,
    params,
    type: strParam(params, "IP_TYPE"),
    version: u32Param(params, "IP_VERSION"),
    id: u32Param(params, "IP_ID"),
    index: u32Param(params, "INDEX"),
    memDepth: u32Param(params, "MEM_DEPTH"),
    probeCount: u32Param(params, "NO_OF_PROBES"),
    axiAddrWidth: u32Param(params, "AXI_ADDR_WIDTH"),
    axiDataWidth: u32Param(params, "AXI_DATA_WIDTH"),
    baseAddress: 0,
    isAxiBridge: false,
    probeOrder: [],
    probes: [],
  };
  if (core.type === ipType && core.memDepth > 0 && core.probeCount > 0) return core;
  log.post(1, "Error: Fail to validate parameters");
  log.post(2, `IP_TYPE: ${core.type}`);
  log.post(2, `MEM_DEPTH: ${core.memDepth}`);
  log.post(2, `NO_OF_PROBES: ${core.probeCount}`);
  return undefined;
}

function subsystemShapeOk(mode: SubsystemMode, cores: number, axiType: AxiType | undefined, noAxiBus: number): boolean {
  if (mode === "NATIVE") return cores >= 1 && cores <= MAX_INTERFACES;
  if (axiType === undefined || noAxiBus < 1) return false;
  if (mode === "AXI") return cores === 1;
  return cores >= 2 && cores <= MAX_INTERFACES;
}

export function buildSubsystem(name: string, params: ParamTable, ipType: string, log: MessageLog): DebugSubsystem | undefined {
  const type = strParam(params, "IP_TYPE");
  const modeText = strParam(params, "Mode");
  const axiTypeText = strParam(params, "Axi_Type");
  const coreCount = u32Param(params, "Cores");
  const noAxiBus = u32Param(params, "No_AXI_Bus");
  const totalProbeCount = u32Param(params, "No_Probes");
  const axiType = isAxiType(axiTypeText) ? axiTypeText : undefined;
  if (
    type === ipType &&
    isMode(modeText) &&
    subsystemShapeOk(modeText, coreCount, axiType, noAxiBus) &&
    totalProbeCount <= MAX_INTERFACES
  ) {
    return {
      kind: "subsystem",
      name,
      params,
      type,
      version: u32Param(params, "IP_VERSION"),
      id: u32Param(params, "IP_ID"),
      mode: modeText,
      axiType: modeText === "NATIVE" ? undefined : axiType,
      noAxiBus,
      coreCount,
      totalProbeCount,
      probesSum: u32Param(params, "Probes_Sum"),
      interfaces: Array.from({ length: MAX_INTERFACES }, (_, i) => ({
        probeWidth: u32Param(params, probeWidthKey(i)),
        baseAddress: u32Param(params, baseAddressKey(i)),
        packedProbes: u64Param(params, packedProbesKey(i)),
      })),
    };
  }
  log.post(1, "Error: Fail to validate parameters");
  log.post(2, `IP_TYPE: ${type}`);
  log.post(2, `Mode: ${modeText}`);
  log.post(2, `Axi_Type: ${axiTypeText}`);
  log.post(2, `No_AXI_Bus: ${noAxiBus}`);
  log.post(2, `Cores: ${coreCount}`);
  log.post(2, `No_Probes: ${totalProbeCount}`);
  return undefined;
}

export function nativeCoreCount(s: DebugSubsystem): number {
  if (s.mode === "NATIVE") return s.coreCount;
  if (s.mode === "NATIVE_AXI") return s.coreCount - 1;
  return 0;
}

/** Index of the AXI bridge core, or undefined in NATIVE mode. */
export function axiBridgeIndex(s: DebugSubsystem): number | undefined {
  return s.mode === "NATIVE" ? undefined : nativeCoreCount(s);
}
