import { MessageLog } from "./message_log.js";
import { MAX_INTERFACES, die, hex32, hex64 } from "./util.js";

export type ParamKind = "u32" | "u64" | "str";

export type ParamValue =
  | { kind: "u32"; value: number }
  | { kind: "u64"; value: bigint }
  | { kind: "str"; value: string };

export type ParamSlot = {
  key: string;
  kind: ParamKind;
};

/** Decoded parameters of one IP candidate; a key is present once it has been assigned. */
export type ParamTable = {
  slots: ParamSlot[];
  values: Map<string, ParamValue>;
};

export type LiteralResult = { ok: true; value: ParamValue } | { ok: false };

const BASE_SLOTS: ParamSlot[] = [
  { key: "IP_TYPE", kind: "str" },
  { key: "IP_VERSION", kind: "u32" },
  { key: "IP_ID", kind: "u32" },
];

export const CORE_SLOTS: ParamSlot[] = [
  ...BASE_SLOTS,
  { key: "AXI_ADDR_WIDTH", kind: "u32" },
  { key: "AXI_DATA_WIDTH", kind: "u32" },
  { key: "MEM_DEPTH", kind: "u32" },
  { key: "NO_OF_PROBES", kind: "u32" },
  { key: "NO_OF_TRIGGER_INPUTS", kind: "u32" },
  { key: "INDEX", kind: "u32" },
];

export const probeWidthKey = (i: number): string => `Probe${i + 1}_Width`;
export const baseAddressKey = (i: number): string => `IF${i + 1}_BaseAddress`;
export const packedProbesKey = (i: number): string => `IF${i + 1}_Probes`;

export const SUBSYSTEM_SLOTS: ParamSlot[] = [
  ...BASE_SLOTS,
  { key: "Mode", kind: "str" },
  { key: "Axi_Type", kind: "str" },
  { key: "No_AXI_Bus", kind: "u32" },
  { key: "Cores", kind: "u32" },
  { key: "No_Probes", kind: "u32" },
  { key: "Probes_Sum", kind: "u32" },
  ...Array.from({ length: MAX_INTERFACES }, (_, i): ParamSlot[] => [
    { key: probeWidthKey(i), kind: "u32" },
    { key: baseAddressKey(i), kind: "u32" },
    { key: packedProbesKey(i), kind: "u64" },
  ]).flat(),
];

const DECIMAL = /^[0-9]+$/;
const SIZED_BINARY = /^([0-9]+)'([01]+)$/;
const ESCAPED = /\\(\\|"|n|t|[0-7]{3})/g;

function unescapeString(s: string): string {
  return s.replace(ESCAPED, (_, code: string) => {
    if (code === "n") return "\n";
    if (code === "t") return "\t";
    if (code.length === 3) return String.fromCharCode(parseInt(code, 8));
    return code;
  });
}

function escapeString(s: string): string {
  let out = "";
  for (const c of s) {
    const code = c.charCodeAt(0);
    if (c === "\n") out += "\\n";
    else if (c === "\t") out += "\\t";
    else if (code < 32) out += `\\${code.toString(8).padStart(3, "0")}`;
    else if (c === '"') out += '\\"';
    else if (c === "\\") out += "\\\\";
    else out += c;
  }
  return out;
}

function decodeInteger(literal: string, maxBits: number): bigint | undefined {
  let value: bigint;
  if (DECIMAL.test(literal)) {
    value = BigInt(literal);
  } else {
    const m = SIZED_BINARY.exec(literal);
    if (!m) return undefined;
    const bits = Number(m[1]);
    if (bits === 0 || bits !== m[2].length || bits > maxBits) return undefined;
    value = BigInt(`0b${m[2]}`);
  }
  return value < 1n << BigInt(maxBits) ? value : undefined;
}

export function decodeParamLiteral(kind: ParamKind, literal: string): LiteralResult {
  if (kind === "str") {
    if (literal.length < 2 || !literal.startsWith('"') || !literal.endsWith('"')) return { ok: false };
    return { ok: true, value: { kind, value: unescapeString(literal.slice(1, -1)) } };
  }
  const value = decodeInteger(literal, kind === "u32" ? 32 : 64);
  if (value === undefined) return { ok: false };
  return kind === "u32" ? { ok: true, value: { kind, value: Number(value) } } : { ok: true, value: { kind, value } };
}

export function encodeParamLiteral(v: ParamValue): string {
  if (v.kind === "str") return `"${escapeString(v.value)}"`;
  if (v.kind === "u32") return String(v.value);
  return `64'${v.value.toString(2).padStart(64, "0")}`;
}

export function formatParamValue(v: ParamValue): string {
  if (v.kind === "str") return v.value;
  if (v.kind === "u32") return `${v.value} (${hex32(v.value)})`;
  return `${v.value} (${hex64(v.value)})`;
}

const KIND_LABEL: Record<ParamKind, string> = { u32: "uint32_t", u64: "uint64_t", str: "string" };

/**
 * Assigns every available parameter into the schema slots, then requires every
 * slot to have been assigned. Returns undefined when the candidate must be
 * discarded; the reasons are in the log.
 */
export function decodeCandidate(slots: ParamSlot[], available: Array<[string, string]>, log: MessageLog): ParamTable | undefined {
  const kinds = new Map(slots.map((s) => [s.key, s.kind]));
  const values = new Map<string, ParamValue>();
  for (const [name, literal] of available) {
    const kind = kinds.get(name);
    if (kind === undefined) {
      log.post(1, `Ignore param ${name}`);
      continue;
    }
    if (values.has(name)) {
      log.post(1, `Error: Param ${name} had been assigned`);
      return undefined;
    }
    const decoded = decodeParamLiteral(kind, literal);
    if (!decoded.ok) {
      log.post(1, `Error: Param ${name} value ${literal} does not follow ${KIND_LABEL[kind]} format`);
      return undefined;
    }
    values.set(name, decoded.value);
    log.post(1, `Param ${name} - ${formatParamValue(decoded.value)}`);
  }
  let complete = true;
  for (const s of slots) {
    if (!values.has(s.key)) {
      log.post(1, `Error: missing parameter ${s.key}`);
      complete = false;
    }
  }
  return complete ? { slots, values } : undefined;
}

export function u32Param(table: ParamTable, key: string): number {
  const v = table.values.get(key);
  if (!v || v.kind !== "u32") return die(`parameter ${key} is not a decoded uint32`);
  return v.value;
}

export function u64Param(table: ParamTable, key: string): bigint {
  const v = table.values.get(key);
  if (!v || v.kind !== "u64") return die(`parameter ${key} is not a decoded uint64`);
  return v.value;
}

export function strParam(table: ParamTable, key: string): string {
  const v = table.values.get(key);
  if (!v || v.kind !== "str") return die(`parameter ${key} is not a decoded string`);
  return v.value;
}
