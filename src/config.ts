import fs from "fs";
import yaml from "js-yaml";
import { z } from "zod";

export type AnalyzerConfig = {
  ipType: string;
  coreModule: string;
  subsystemModule: string;
  /** Port name on the subsystem instantiator; `{n}` is the 1-based probe number. */
  probePort: string;
  output: string;
  verbose: boolean;
};

export const defaultAnalyzerConfig: AnalyzerConfig = {
  ipType: "OCLA",
  coreModule: "ocla",
  subsystemModule: "ocla_debug_subsystem",
  probePort: "probe_{n}",
  output: "ocla.json",
  verbose: false,
};

const rulesSchema = z
  .object({
    ip_type: z.string().min(1).optional(),
    modules: z
      .object({
        core: z.string().min(1).optional(),
        subsystem: z.string().min(1).optional(),
      })
      .optional(),
    probe_port: z.string().includes("{n}").optional(),
    output: z.string().min(1).optional(),
    verbose: z.boolean().optional(),
  })
  .nullable();

export function mergeConfig(rules: unknown): AnalyzerConfig {
  const parsed = rulesSchema.safeParse(rules ?? null);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid analyzer rules at ${issue.path.join(".") || "<root>"}: ${issue.message}`);
  }
  const raw = parsed.data ?? {};
  return {
    ipType: raw.ip_type ?? defaultAnalyzerConfig.ipType,
    coreModule: raw.modules?.core ?? defaultAnalyzerConfig.coreModule,
    subsystemModule: raw.modules?.subsystem ?? defaultAnalyzerConfig.subsystemModule,
    probePort: raw.probe_port ?? defaultAnalyzerConfig.probePort,
    output: raw.output ?? defaultAnalyzerConfig.output,
    verbose: raw.verbose ?? defaultAnalyzerConfig.verbose,
  };
}

export function loadConfig(rulesPath?: string): AnalyzerConfig {
  if (!rulesPath) return { ...defaultAnalyzerConfig };
  return mergeConfig(yaml.load(fs.readFileSync(rulesPath, "utf8")));
}

export function probePortName(cfg: AnalyzerConfig, probeIndex: number): string {
  return cfg.probePort.replace("{n}", String(probeIndex + 1));
}
