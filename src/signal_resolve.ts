import { axiBridgeFragments } from "./axi_signals.js";
import { type AnalyzerConfig, probePortName } from "./config.js";
import type { CoreInstance, DebugSubsystem } from "./ip.js";
import { MessageLog } from "./message_log.js";
import { type Module, connectionFragments } from "./netlist.js";
import { type SignalFragment, formatFragments, fragmentWidth } from "./signal.js";
import { die } from "./util.js";

function attachProbes(core: CoreInstance, fragments: SignalFragment[], log: MessageLog): boolean {
  if (core.probes.length > 0) {
    log.post(2, `Error: Duplicated connection for module ${core.name}`);
    return false;
  }
  core.probes = fragments;
  return true;
}

/**
 * Runs on the flattened design: reads each native core's probe ports off the
 * black-boxed instantiator cell in top and synthesises the bus signals of the
 * AXI bridge core. Every probe connection must be exactly as wide as its
 * declared Probe{n}_Width.
 */
export function resolveProbeSignals(
  top: Module,
  s: DebugSubsystem,
  cores: CoreInstance[],
  instantiatorType: string,
  cfg: AnalyzerConfig,
  log: MessageLog,
): boolean {
  log.post(0, `Retrieve OCLA signals from instantiator: ${instantiatorType}`);
  for (const c of cores) if (c.probes.length > 0) die(`probe signals of ${c.name} are already resolved`);
  const cells = top.cells.filter((c) => c.type === instantiatorType);
  if (cells.length !== 1) {
    log.post(1, `Error: Expect one instance of ${instantiatorType} in ${top.name} but found ${cells.length}`);
    return false;
  }
  const cell = cells[0];
  log.post(1, `Instantiated as ${cell.name}`);
  let ok = true;
  for (const core of cores) {
    const fragments: SignalFragment[] = [];
    if (core.isAxiBridge) {
      const axiType = s.axiType ?? die(`subsystem ${s.name} in ${s.mode} mode has no AXI type`);
      fragments.push(...axiBridgeFragments(axiType, s.noAxiBus));
      log.post(1, `Module ${core.name} bridges ${s.noAxiBus} ${axiType} bus(es) with ${fragments.length} signal(s)`);
    } else {
      for (const p of [...core.probeOrder].reverse()) {
        const port = probePortName(cfg, p);
        const bits = cell.connections[port];
        if (bits === undefined) {
          log.post(2, `Error: Missing probe connection ${port} for module ${core.name}`);
          ok = false;
          continue;
        }
        log.post(2, `Potential Probe Connection: ${port}`);
        const found = connectionFragments(top, bits);
        if (found.length === 0) {
          log.post(3, `Error: Fail to parse connection ${port}`);
          ok = false;
          continue;
        }
        log.post(3, `Connected to ${formatFragments(found)}`);
        fragments.push(...found);
        const width = found.reduce((sum, f) => sum + fragmentWidth(f), 0);
        const declared = s.interfaces[p].probeWidth;
        if (width !== declared) {
          log.post(3, `Error: Connection ${port} is ${width} bit(s) but Probe${p + 1}_Width is ${declared}`);
          ok = false;
        }
      }
    }
    if (!attachProbes(core, fragments, log)) ok = false;
  }
  for (const c of cores) {
    if (c.probes.length === 0) {
      log.post(2, `Error: Module ${c.name} (INDEX=${c.index}) failed to get probe signals`);
      ok = false;
    }
  }
  return ok;
}
