import fs from "fs";
import { z } from "zod";
import type { AxiType } from "./ip.js";
import { type SignalFragment, wireFragment } from "./signal.js";

export type AxiSignal = { name: string; width: number };

const signalTableSchema = z.object({
  AXI4: z.array(z.object({ name: z.string().min(1), width: z.number().int().positive() })),
  AXILite: z.array(z.object({ name: z.string().min(1), width: z.number().int().positive() })),
});

let table: Record<AxiType, AxiSignal[]> | undefined;

function loadTable(): Record<AxiType, AxiSignal[]> {
  if (!table) {
    const text = fs.readFileSync(new URL("../data/axi_signals.json", import.meta.url), "utf8");
    table = signalTableSchema.parse(JSON.parse(text));
  }
  return table;
}

export function axiSignals(type: AxiType): AxiSignal[] {
  return loadTable()[type];
}

/** Probe bits one bus of the given type feeds into the bridge core. */
export function axiBusWidth(type: AxiType): number {
  return axiSignals(type).reduce((sum, s) => sum + s.width, 0);
}

/** Bus signals repeated per bus; names carry a `_<bus>` suffix only when there are several buses. */
export function axiBridgeFragments(type: AxiType, noAxiBus: number): SignalFragment[] {
  const out: SignalFragment[] = [];
  for (let bus = 1; bus <= noAxiBus; bus++) {
    for (const s of axiSignals(type)) {
      const name = noAxiBus > 1 ? `${s.name}_${bus}` : s.name;
      out.push(wireFragment(name, s.width, s.width));
    }
  }
  return out;
}
