import type { AnalyzerConfig } from "./config.js";
import { type CoreInstance, type DebugSubsystem, buildCore, buildSubsystem } from "./ip.js";
import { MessageLog } from "./message_log.js";
import type { Design } from "./netlist.js";
import { CORE_SLOTS, SUBSYSTEM_SLOTS, decodeCandidate } from "./param_schema.js";
import { matchesModuleName } from "./util.js";

export type ModuleRole = "core" | "subsystem";

export type Classification = {
  cores: CoreInstance[];
  subsystems: DebugSubsystem[];
};

export function classifyModule(moduleName: string, cfg: AnalyzerConfig): ModuleRole | undefined {
  if (matchesModuleName(moduleName, cfg.coreModule)) return "core";
  if (matchesModuleName(moduleName, cfg.subsystemModule)) return "subsystem";
  return undefined;
}

function insertByIndex(cores: CoreInstance[], core: CoreInstance): void {
  const at = cores.findIndex((c) => core.index < c.index);
  if (at < 0) cores.push(core);
  else cores.splice(at, 0, core);
}

export function classifyDesign(design: Design, cfg: AnalyzerConfig, log: MessageLog): Classification {
  const out: Classification = { cores: [], subsystems: [] };
  if (design.flattened) {
    log.post(0, "Error: modules cannot be classified once the design is flattened");
    return out;
  }
  for (const m of design.modules.values()) {
    const role = classifyModule(m.name, cfg);
    if (role === "core") {
      log.post(0, `Detected Potential OCLA: ${m.name}`);
      const params = decodeCandidate(CORE_SLOTS, m.parameters, log);
      const core = params && buildCore(m.name, params, cfg.ipType, log);
      if (core) {
        insertByIndex(out.cores, core);
        log.post(1, "Qualified as OCLA module");
      } else {
        log.post(1, "Error: this is not qualified as OCLA module");
      }
    } else if (role === "subsystem") {
      log.post(0, `Detected Potential OCLA Debug Subsystem: ${m.name}`);
      const params = decodeCandidate(SUBSYSTEM_SLOTS, m.parameters, log);
      const subsystem = params && buildSubsystem(m.name, params, cfg.ipType, log);
      if (subsystem) {
        out.subsystems.push(subsystem);
        log.post(1, "Qualified as OCLA Debug Subsystem module");
      } else {
        log.post(1, "Error: this is not qualified as OCLA Debug Subsystem module");
      }
    }
  }
  return out;
}
