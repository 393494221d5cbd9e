import { type SignalFragment, constFragment, wireFragment } from "./signal.js";
import { die } from "./util.js";

/** A net id, or a constant driver. Signals are stored LSB first. */
export type Bit = number | "0" | "1" | "x" | "z";

export type NetName = {
  name: string;
  bits: Bit[];
  hidden: boolean;
  upto: boolean;
};

export type Port = {
  direction: "input" | "output" | "inout";
  bits: Bit[];
};

export type Cell = {
  name: string;
  type: string;
  connections: Record<string, Bit[]>;
};

export type Module = {
  name: string;
  attributes: Record<string, string>;
  /** Declared parameters with their default value rendered as a literal. */
  parameters: Array<[string, string]>;
  ports: Record<string, Port>;
  cells: Cell[];
  netnames: NetName[];
  blackbox: boolean;
};

export type Design = {
  modules: Map<string, Module>;
  top?: string;
  flattened: boolean;
};

export function topModule(design: Design): Module | undefined {
  return design.top === undefined ? undefined : design.modules.get(design.top);
}

function isTopAttribute(v: string | undefined): boolean {
  if (v === undefined) return false;
  return /^[01]+$/.test(v) ? /1/.test(v) : v.trim() !== "" && v.trim() !== "0";
}

export function markedTop(design: Design): string | undefined {
  for (const m of design.modules.values()) {
    if (isTopAttribute(m.attributes.top)) return m.name;
  }
  return undefined;
}

function hierarchyDepth(design: Design, name: string, stack: Set<string>): number {
  const m = design.modules.get(name);
  if (!m || m.blackbox || stack.has(name)) return 0;
  stack.add(name);
  let best = 0;
  for (const c of m.cells) best = Math.max(best, 1 + hierarchyDepth(design, c.type, stack));
  stack.delete(name);
  return best;
}

/** Picks the uninstantiated module with the deepest hierarchy. */
export function autoTop(design: Design): string | undefined {
  const instantiated = new Set<string>();
  for (const m of design.modules.values()) for (const c of m.cells) instantiated.add(c.type);
  let best: { name: string; depth: number } | undefined;
  for (const m of design.modules.values()) {
    if (instantiated.has(m.name) || m.blackbox) continue;
    const depth = hierarchyDepth(design, m.name, new Set());
    if (!best || depth > best.depth) best = { name: m.name, depth };
  }
  return best?.name;
}

export function blackboxModule(design: Design, name: string): void {
  const m = design.modules.get(name) ?? die(`cannot blackbox unknown module ${name}`);
  const portNames = new Set(Object.keys(m.ports));
  m.cells = [];
  m.netnames = m.netnames.filter((n) => portNames.has(n.name));
  m.attributes = { ...m.attributes, blackbox: "1" };
  m.blackbox = true;
}

function maxNet(m: Module): number {
  let max = 0;
  const visit = (bits: Bit[]) => {
    for (const b of bits) if (typeof b === "number" && b > max) max = b;
  };
  for (const p of Object.values(m.ports)) visit(p.bits);
  for (const n of m.netnames) visit(n.bits);
  for (const c of m.cells) for (const bits of Object.values(c.connections)) visit(bits);
  return max;
}

function inlineCell(parent: Module, cell: Cell, child: Module, nextNet: () => number): void {
  const netMap = new Map<number, Bit>();
  for (const [portName, port] of Object.entries(child.ports)) {
    const outer = cell.connections[portName] ?? [];
    port.bits.forEach((b, i) => {
      if (typeof b !== "number" || netMap.has(b)) return;
      netMap.set(b, i < outer.length ? outer[i] : nextNet());
    });
  }
  const mapBits = (bits: Bit[]): Bit[] =>
    bits.map((b) => {
      if (typeof b !== "number") return b;
      let mapped = netMap.get(b);
      if (mapped === undefined) {
        mapped = nextNet();
        netMap.set(b, mapped);
      }
      return mapped;
    });
  for (const n of child.netnames) {
    parent.netnames.push({ ...n, name: `${cell.name}.${n.name}`, bits: mapBits(n.bits) });
  }
  for (const c of child.cells) {
    const connections: Record<string, Bit[]> = {};
    for (const [port, bits] of Object.entries(c.connections)) connections[port] = mapBits(bits);
    parent.cells.push({ name: `${cell.name}.${c.name}`, type: c.type, connections });
  }
}

/**
 * Inlines every non-blackbox submodule into the top module. Modules other than
 * the top keep their contents; after this the design hierarchy is no longer
 * meaningful.
 */
export function flattenDesign(design: Design): void {
  const top = topModule(design) ?? die("cannot flatten a design without a top module");
  let net = maxNet(top);
  const nextNet = () => ++net;
  const depthOf = new Map<string, number>();
  for (;;) {
    const idx = top.cells.findIndex((c) => {
      const m = design.modules.get(c.type);
      return m !== undefined && !m.blackbox;
    });
    if (idx < 0) break;
    const cell = top.cells[idx];
    const child = design.modules.get(cell.type) ?? die(`module ${cell.type} disappeared`);
    const depth = (depthOf.get(cell.name) ?? 0) + 1;
    if (depth > design.modules.size) die(`recursive instantiation of ${child.name}`);
    top.cells.splice(idx, 1);
    const before = top.cells.length;
    inlineCell(top, cell, child, nextNet);
    for (const c of top.cells.slice(before)) depthOf.set(c.name, depth);
  }
  design.flattened = true;
}

type BitName = { net: NetName; pos: number; rank: number };

function nameRank(n: NetName): number {
  return (n.hidden ? 1_000 : 0) + n.name.split(".").length;
}

function bitNames(m: Module): Map<number, BitName> {
  const out = new Map<number, BitName>();
  for (const net of m.netnames) {
    const rank = nameRank(net);
    net.bits.forEach((b, pos) => {
      if (typeof b !== "number") return;
      const prev = out.get(b);
      if (!prev || rank < prev.rank) out.set(b, { net, pos, rank });
    });
  }
  return out;
}

/** Groups a connection into fragments, most significant first. */
export function connectionFragments(m: Module, bits: Bit[]): SignalFragment[] {
  const names = bitNames(m);
  const lsbFirst: SignalFragment[] = [];
  for (const b of bits) {
    const last = lsbFirst[lsbFirst.length - 1];
    if (typeof b !== "number") {
      if (last?.kind === "const") last.bits = `${b}${last.bits}`;
      else lsbFirst.push(constFragment(b));
      continue;
    }
    const named = names.get(b);
    if (!named) {
      lsbFirst.push(wireFragment(`$${b}`, 1, 1));
      continue;
    }
    if (last?.kind === "wire" && last.wire === named.net.name && last.offset + last.width === named.pos) {
      last.width += 1;
      continue;
    }
    lsbFirst.push(wireFragment(named.net.name, named.net.bits.length, 1, named.pos, named.net.upto));
  }
  return lsbFirst.reverse();
}

export function instantiatingCells(design: Design, type: string): Array<{ parent: Module; cell: Cell }> {
  const out: Array<{ parent: Module; cell: Cell }> = [];
  for (const m of design.modules.values()) {
    for (const c of m.cells) if (c.type === type) out.push({ parent: m, cell: c });
  }
  return out;
}
