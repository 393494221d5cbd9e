import fs from "fs";

export const MAX_INTERFACES = 15;

export function die(msg: string): never {
  throw new Error(msg);
}

export function writeText(path: string, data: string): void {
  fs.writeFileSync(path, data, "utf8");
}

export function hex32(v: number): string {
  return `0x${(v >>> 0).toString(16).toUpperCase().padStart(8, "0")}`;
}

export function hex64(v: bigint): string {
  return `0x${v.toString(16).toUpperCase().padStart(16, "0")}`;
}

export function matchesModuleName(moduleName: string, target: string): boolean {
  return moduleName === target || moduleName.endsWith(`\\${target}`);
}
