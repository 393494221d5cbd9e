import { type DebugSubsystem, type ProbeMap, axiBridgeIndex, nativeCoreCount } from "./ip.js";
import { MessageLog } from "./message_log.js";
import { MAX_INTERFACES, hex64 } from "./util.js";

export type ProbeMapResult = { ok: true; map: ProbeMap } | { ok: false };

export function emptyProbeMap(): ProbeMap {
  return {
    probeOrder: Array.from({ length: MAX_INTERFACES }, () => []),
    probeToCore: Array.from({ length: MAX_INTERFACES }, () => undefined),
    calculatedCoreWidth: Array.from({ length: MAX_INTERFACES }, () => 0),
  };
}

/**
 * Each native interface packs its probe numbers (1-based) four bits apiece,
 * first probe in the least significant nibble. A probe belongs to exactly one
 * interface and lands at the interface's running width.
 */
export function decodeProbeMap(s: DebugSubsystem, log: MessageLog): ProbeMapResult {
  const native = nativeCoreCount(s);
  const maxProbe = Math.min(MAX_INTERFACES, s.totalProbeCount);
  const map = emptyProbeMap();
  const seen = new Set<number>();
  log.post(1, `Decode IF[1..${native}]_Probes (No_Probes=${s.totalProbeCount})`);
  for (let i = 0; i < MAX_INTERFACES; i++) {
    let packed = s.interfaces[i].packedProbes;
    if (i >= native) {
      if (packed !== 0n) {
        log.post(2, `Error: IF${i + 1}_Probes must be zero but found ${hex64(packed)}`);
        return { ok: false };
      }
      continue;
    }
    if (packed === 0n) {
      log.post(2, `Error: IF${i + 1}_Probes must not be zero`);
      return { ok: false };
    }
    while (packed !== 0n) {
      const p = Number(packed & 0xfn);
      packed >>= 4n;
      if (p < 1 || p > maxProbe) {
        log.post(2, `Error: IF${i + 1}_Probes refers to invalid probe ${p} (expect 1..${maxProbe})`);
        return { ok: false };
      }
      const width = s.interfaces[p - 1].probeWidth;
      if (width === 0) {
        log.post(2, `Error: IF${i + 1}_Probes refers to probe ${p} but Probe${p}_Width is zero`);
        return { ok: false };
      }
      if (seen.has(p)) {
        log.post(2, `Error: Duplicated Probe ${p} found in IF${i + 1}_Probes`);
        return { ok: false };
      }
      seen.add(p);
      const offset = map.calculatedCoreWidth[i];
      map.probeOrder[i].push(p - 1);
      map.probeToCore[p - 1] = { core: i, offset };
      map.calculatedCoreWidth[i] += width;
      log.post(2, `Probe ${p} (width=${width}) -> IF${i + 1} at offset ${offset}`);
    }
  }
  if (seen.size !== s.totalProbeCount) {
    log.post(2, `Error: ${seen.size} probe(s) are assigned but No_Probes is ${s.totalProbeCount}`);
    return { ok: false };
  }
  for (let i = 0; i < native; i++) {
    if (map.probeOrder[i].length === 0) {
      log.post(2, `Error: IF${i + 1} does not own any probe`);
      return { ok: false };
    }
  }
  const axi = axiBridgeIndex(s);
  if (axi !== undefined && map.calculatedCoreWidth[axi] !== 0) {
    log.post(2, `Error: AXI bridge IF${axi + 1} must not own any probe`);
    return { ok: false };
  }
  return { ok: true, map };
}
