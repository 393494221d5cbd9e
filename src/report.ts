import type { CoreInstance, DebugSubsystem } from "./ip.js";
import { MessageLog } from "./message_log.js";
import type { ParamTable } from "./param_schema.js";
import { probeSignalName } from "./signal.js";
import { writeText } from "./util.js";

export type ParamSection = Record<string, string | number>;

export type ProbeInfo = {
  index: number;
  offset: number;
  width: number;
};

/** Core parameters flattened alongside `addr`, `probe_info` (native cores) and `probes`. */
export type CoreSection = Record<string, string | number | string[] | ProbeInfo[]>;

export type AnalysisDocument = {
  messages: string[];
  ocla?: CoreSection[];
  ocla_debug_subsystem?: ParamSection;
};

export type QualifiedDesign = {
  subsystem: DebugSubsystem;
  cores: CoreInstance[];
};

/** u64 values are written as decimal strings so no bit is lost in JSON. */
export function paramSection(params: ParamTable): ParamSection {
  const out: ParamSection = {};
  for (const slot of params.slots) {
    const v = params.values.get(slot.key);
    if (!v) continue;
    out[slot.key] = v.kind === "u64" ? v.value.toString() : v.value;
  }
  return out;
}

function probeInfo(core: CoreInstance, s: DebugSubsystem): ProbeInfo[] {
  return core.probeOrder.map((p) => ({
    index: p + 1,
    offset: s.mapping?.probeToCore[p]?.offset ?? 0,
    width: s.interfaces[p].probeWidth,
  }));
}

function coreSection(core: CoreInstance, s: DebugSubsystem): CoreSection {
  const out: CoreSection = { ...paramSection(core.params), addr: core.baseAddress };
  if (!core.isAxiBridge) out.probe_info = probeInfo(core, s);
  out.probes = core.probes.map(probeSignalName);
  return out;
}

export function buildReport(log: MessageLog, qualified?: QualifiedDesign): AnalysisDocument {
  const doc: AnalysisDocument = { messages: log.lines() };
  if (qualified && qualified.cores.length > 0) {
    doc.ocla = qualified.cores.map((c) => coreSection(c, qualified.subsystem));
    doc.ocla_debug_subsystem = paramSection(qualified.subsystem.params);
  }
  return doc;
}

export function writeReport(path: string, doc: AnalysisDocument): void {
  writeText(path, `${JSON.stringify(doc, null, 2)}\n`);
}
