import { classifyDesign } from "./classify.js";
import { type AnalyzerConfig, defaultAnalyzerConfig } from "./config.js";
import { finalizeCore } from "./finalize.js";
import { findInstantiators, resolveUniquePath } from "./hierarchy.js";
import { MessageLog } from "./message_log.js";
import { type Design, blackboxModule, flattenDesign, topModule } from "./netlist.js";
import { type AnalysisDocument, type QualifiedDesign, buildReport } from "./report.js";
import { sanityCheck } from "./sanity_check.js";
import { describeFragment } from "./signal.js";
import { resolveProbeSignals } from "./signal_resolve.js";
import { die } from "./util.js";

export type AnalysisResult = {
  document: AnalysisDocument;
  /** Cores that passed every stage; zero as soon as any of them fails. */
  qualified: number;
};

/** The run cannot continue; `document` holds the messages logged so far. */
export class AnalysisAbort extends Error {
  constructor(
    message: string,
    readonly document: AnalysisDocument,
  ) {
    super(message);
    this.name = "AnalysisAbort";
  }
}

function runStages(design: Design, cfg: AnalyzerConfig, log: MessageLog): QualifiedDesign | undefined {
  const { cores, subsystems } = classifyDesign(design, cfg, log);
  if (cores.length === 0 || subsystems.length !== 1) {
    log.post(0, `Warning/Error: OCLA module count=${cores.length}, OCLA Debug Subsystem module count=${subsystems.length}`);
    return undefined;
  }
  const subsystem = subsystems[0];

  const path = resolveUniquePath(design, subsystem.name, log);
  if (!path.ok) {
    log.post(1, "Error: Currently only support one OCLA Debug Subsystem instance in a design");
    return undefined;
  }

  const instantiators = cores.flatMap((c) => findInstantiators(design, c.name, log));
  if (instantiators.length === 0) {
    log.post(0, "Error: Does not find any OCLA instantiator");
    return undefined;
  }

  if (!sanityCheck(subsystem, cores, instantiators, log)) {
    log.post(0, "Error: Sanity check fail");
    return undefined;
  }

  const { instantiator } = path.path;
  log.post(0, `Run command: blackbox ${instantiator}`);
  blackboxModule(design, instantiator);
  log.post(0, "Run command: flatten");
  flattenDesign(design);

  const top = topModule(design) ?? die("top module vanished during flatten");
  if (!resolveProbeSignals(top, subsystem, cores, instantiator, cfg, log)) {
    log.post(0, "Error: Fail to get probe signals");
    return undefined;
  }

  let failed = false;
  for (const core of cores) {
    log.post(1, `Module: ${core.name}`);
    log.post(2, "Final checking ...");
    if (!finalizeCore(core, subsystem, log)) {
      log.post(3, "Error: Disqualify this module");
      failed = true;
      continue;
    }
    log.post(3, "Probes:");
    for (const f of core.probes) {
      const info = describeFragment(f);
      log.post(4, `--> ${info.fullname}`);
      log.post(5, `: ${info.name} (width=${info.width}, offset=${info.offset})`);
    }
  }
  return failed ? undefined : { subsystem, cores };
}

/**
 * Runs the whole analysis on a design. The design is black-boxed and
 * flattened in place once the hierarchy checks pass.
 */
export function analyzeDesign(design: Design, cfg: AnalyzerConfig = defaultAnalyzerConfig): AnalysisResult {
  const log = new MessageLog(cfg.verbose);
  log.post(0, "Start of OCLA Analysis");
  if (!topModule(design)) {
    log.post(0, "Cannot find top module");
    log.post(0, "End of OCLA Analysis");
    throw new AnalysisAbort("Cannot find top module", buildReport(log));
  }
  const qualified = runStages(design, cfg, log);
  log.post(0, "End of OCLA Analysis");
  return { document: buildReport(log, qualified), qualified: qualified?.cores.length ?? 0 };
}
