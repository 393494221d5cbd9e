import fs from "fs";
import { z } from "zod";
import { type Design, type Module, type NetName, autoTop, markedTop } from "./netlist.js";

const bitSchema = z.union([z.number().int().nonnegative(), z.enum(["0", "1", "x", "z"])]);
const scalarSchema = z.union([z.string(), z.number()]);

const moduleSchema = z.object({
  attributes: z.record(scalarSchema).optional(),
  parameter_default_values: z.record(scalarSchema).optional(),
  ports: z
    .record(
      z.object({
        direction: z.enum(["input", "output", "inout"]),
        bits: z.array(bitSchema),
      }),
    )
    .optional(),
  cells: z
    .record(
      z.object({
        type: z.string(),
        hide_name: z.number().optional(),
        parameters: z.record(scalarSchema).optional(),
        connections: z.record(z.array(bitSchema)).optional(),
      }),
    )
    .optional(),
  netnames: z
    .record(
      z.object({
        bits: z.array(bitSchema),
        hide_name: z.number().optional(),
        upto: z.number().optional(),
      }),
    )
    .optional(),
});

const netlistSchema = z.object({
  creator: z.string().optional(),
  modules: z.record(moduleSchema),
});

type RawModule = z.infer<typeof moduleSchema>;

export type NetlistOptions = {
  top?: string;
  autoTop?: boolean;
};

/**
 * Renders a parameter value as the netlist tool prints constants: strings
 * quoted, a defined 32-bit value with the sign bit clear in decimal, anything
 * else as `<width>'<bits>`.
 */
export function renderParamLiteral(v: string | number): string {
  if (typeof v === "number") return String(v);
  if (/^[01xz]+$/.test(v)) {
    if (v.length === 32 && /^0[01]*$/.test(v)) return BigInt(`0b${v}`).toString();
    return `${v.length}'${v}`;
  }
  const text = v.endsWith(" ") && /^[01xz]*$/.test(v.slice(0, -1)) ? v.slice(0, -1) : v;
  let out = '"';
  for (const c of text) {
    const code = c.charCodeAt(0);
    if (c === "\n") out += "\\n";
    else if (c === "\t") out += "\\t";
    else if (code < 32) out += `\\${code.toString(8).padStart(3, "0")}`;
    else if (c === '"') out += '\\"';
    else if (c === "\\") out += "\\\\";
    else out += c;
  }
  return `${out}"`;
}

function toModule(name: string, raw: RawModule): Module {
  const attributes: Record<string, string> = {};
  for (const [k, v] of Object.entries(raw.attributes ?? {})) attributes[k] = String(v);
  const netnames: NetName[] = Object.entries(raw.netnames ?? {}).map(([n, net]) => ({
    name: n,
    bits: net.bits,
    hidden: (net.hide_name ?? 0) !== 0 || n.startsWith("$"),
    upto: (net.upto ?? 0) !== 0,
  }));
  return {
    name,
    attributes,
    parameters: Object.entries(raw.parameter_default_values ?? {}).map(([k, v]): [string, string] => [k, renderParamLiteral(v)]),
    ports: raw.ports ?? {},
    cells: Object.entries(raw.cells ?? {}).map(([cellName, c]) => ({
      name: cellName,
      type: c.type,
      connections: c.connections ?? {},
    })),
    netnames,
    blackbox: isTruthy(attributes.blackbox),
  };
}

function isTruthy(v: string | undefined): boolean {
  return v !== undefined && /1/.test(v);
}

export function parseNetlistJson(text: string, opts: NetlistOptions = {}): Design {
  const parsed = netlistSchema.safeParse(JSON.parse(text));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid netlist JSON at ${issue.path.join(".") || "<root>"}: ${issue.message}`);
  }
  const modules = new Map<string, Module>();
  for (const [name, raw] of Object.entries(parsed.data.modules)) modules.set(name, toModule(name, raw));
  const design: Design = { modules, flattened: false };
  if (opts.top !== undefined) {
    design.top = modules.has(opts.top) ? opts.top : undefined;
  } else {
    design.top = opts.autoTop ? autoTop(design) : markedTop(design);
  }
  return design;
}

export function readNetlist(path: string, opts: NetlistOptions = {}): Design {
  return parseNetlistJson(fs.readFileSync(path, "utf8"), opts);
}
