import { die } from "./util.js";

/** Constant bits are held MSB first, as they are printed. */
export type ConstFragment = {
  kind: "const";
  bits: string;
};

/** `offset` counts bit positions from the LSB; `msbFirst` wires are declared `[lo:hi]`. */
export type WireFragment = {
  kind: "wire";
  wire: string;
  wireWidth: number;
  width: number;
  offset: number;
  msbFirst: boolean;
};

export type SignalFragment = ConstFragment | WireFragment;

export type FragmentInfo = {
  fullname: string;
  name: string;
  width: number;
  offset: number;
  showIndex: boolean;
};

export function constFragment(bits: string): ConstFragment {
  if (bits.length === 0) die("constant fragment must carry at least one bit");
  return { kind: "const", bits };
}

export function wireFragment(wire: string, wireWidth: number, width: number, offset = 0, msbFirst = false): WireFragment {
  if (width <= 0) die(`fragment of ${wire} must have a positive width`);
  return { kind: "wire", wire, wireWidth, width, offset, msbFirst };
}

export function fragmentWidth(f: SignalFragment): number {
  return f.kind === "const" ? f.bits.length : f.width;
}

function shortName(fullname: string): string {
  let name = fullname;
  const dot = name.lastIndexOf(".");
  if (dot >= 0) name = name.slice(dot + 1);
  if (name.startsWith("\\")) name = name.slice(1);
  return name;
}

function bitIndex(f: WireFragment, pos: number): number {
  return f.msbFirst ? f.wireWidth - 1 - pos : pos;
}

function wireRange(f: WireFragment): string {
  const lsb = bitIndex(f, f.offset);
  if (f.width === 1) return `[${lsb}]`;
  return `[${bitIndex(f, f.offset + f.width - 1)}:${lsb}]`;
}

export function describeFragment(f: SignalFragment): FragmentInfo {
  if (f.kind === "const") {
    const fullname = `${f.bits.length}'${f.bits}`;
    return { fullname, name: fullname, width: f.bits.length, offset: 0, showIndex: false };
  }
  const fullname = f.width === f.wireWidth && f.offset === 0 ? f.wire : `${f.wire} ${wireRange(f)}`;
  const showIndex = !(f.width === f.wireWidth && f.width === 1 && f.offset === 0);
  return { fullname, name: shortName(f.wire), width: f.width, offset: f.offset, showIndex };
}

export function probeSignalName(f: SignalFragment): string {
  const info = describeFragment(f);
  if (f.kind === "const" || !info.showIndex) return info.name;
  return `${info.name}${wireRange(f)}`;
}

export function formatFragments(fragments: SignalFragment[]): string {
  if (fragments.length === 1) return describeFragment(fragments[0]).fullname;
  return `{ ${fragments.map((f) => describeFragment(f).fullname).join(" ")} }`;
}
