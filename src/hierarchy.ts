import { MessageLog } from "./message_log.js";
import { type Design, instantiatingCells, topModule } from "./netlist.js";

export type UniquePath = {
  /** Module that directly instantiates the target. */
  instantiator: string;
  /** Instance names from the target's own cell up to the child of top. */
  chain: string[];
};

export type PathResult = { ok: true; path: UniquePath } | { ok: false };

/**
 * Walks from `moduleName` up to the top module, requiring exactly one
 * instantiating cell at every level and at least two levels in total.
 */
export function resolveUniquePath(design: Design, moduleName: string, log: MessageLog): PathResult {
  log.post(0, "Check uniqueness of OCLA Debug Subsystem");
  if (design.flattened) {
    log.post(1, "Error: hierarchy cannot be resolved once the design is flattened");
    return { ok: false };
  }
  const top = topModule(design);
  if (!top) {
    log.post(1, "Error: design has no top module");
    return { ok: false };
  }
  const chain: string[] = [];
  let instantiator = "";
  let target = moduleName;
  for (;;) {
    log.post(1, `Module: ${target}`);
    const users = instantiatingCells(design, target);
    for (const u of users) log.post(2, `Instantiated by ${u.parent.name} as ${u.cell.name}`);
    if (users.length !== 1) {
      log.post(2, users.length === 0 ? "Error: not instantiated by any module" : `Error: instantiated ${users.length} times`);
      return { ok: false };
    }
    const { parent, cell } = users[0];
    chain.push(cell.name);
    if (chain.length === 1) instantiator = parent.name;
    if (parent.name === top.name) {
      log.post(3, "This is top module");
      if (chain.length < 2) {
        log.post(3, "Error: Hierarchy level for OCLA Debug Subsystem is out of expectation");
        return { ok: false };
      }
      log.post(3, `Connection chain for OCLA Debug Subsystem: ${[...chain].reverse().join(".")}`);
      break;
    }
    if (chain.length > design.modules.size) {
      log.post(2, `Error: instantiation loop through ${parent.name}`);
      return { ok: false };
    }
    target = parent.name;
  }
  log.post(1, `OCLA Debug Subsystem Instantiator: ${instantiator}`);
  return { ok: true, path: { instantiator, chain } };
}

/** Names of every module holding a cell of the given type, one entry per cell. */
export function findInstantiators(design: Design, moduleName: string, log: MessageLog): string[] {
  log.post(0, `Check instantiator for OCLA module ${moduleName}`);
  const names = instantiatingCells(design, moduleName).map((u) => u.parent.name);
  for (const n of names) log.post(1, `Instantiated by ${n}`);
  if (names.length === 0) log.post(1, "Warning: Does not detect any instantiator");
  return names;
}
