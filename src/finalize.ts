import type { CoreInstance, DebugSubsystem } from "./ip.js";
import { MessageLog } from "./message_log.js";
import { fragmentWidth } from "./signal.js";

/**
 * Last check of one core after its probes are resolved. The total width must
 * equal NO_OF_PROBES and, for a native core, each probe (walked in stream
 * order, last declared first) must be covered by whole fragments.
 */
export function finalizeCore(core: CoreInstance, s: DebugSubsystem, log: MessageLog, level = 3): boolean {
  const total = core.probes.reduce((sum, f) => sum + fragmentWidth(f), 0);
  if (total !== core.probeCount) {
    log.post(level, `Error: Invalid total probe signal(s) bus size ${total} (NO_OF_PROBES ${core.probeCount})`);
    return false;
  }
  if (core.isAxiBridge) return true;
  let at = 0;
  for (const p of [...core.probeOrder].reverse()) {
    let need = s.interfaces[p].probeWidth;
    while (need > 0) {
      if (at >= core.probes.length) {
        log.post(level, `Error: Probe ${p + 1} is short of ${need} bit(s)`);
        return false;
      }
      const width = fragmentWidth(core.probes[at]);
      if (width > need) {
        log.post(level, `Error: Signal of probe ${p + 1} straddles its declared width ${s.interfaces[p].probeWidth}`);
        return false;
      }
      need -= width;
      at++;
    }
  }
  if (at !== core.probes.length) {
    log.post(level, `Error: ${core.probes.length - at} signal(s) left over after the last probe`);
    return false;
  }
  return true;
}
