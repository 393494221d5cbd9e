#!/usr/bin/env node
import { AnalysisAbort, analyzeDesign } from "./analyze.js";
import { loadConfig } from "./config.js";
import { readNetlist } from "./netlist_parse.js";
import { writeReport } from "./report.js";

const USAGE =
  "Usage: ocla-analyze <netlist.json> [-top <top_module_name> | -auto-top] [-file <out.json>] [-config <rules.yaml>]";

type CliArgs = {
  netlist: string;
  top?: string;
  autoTop: boolean;
  file?: string;
  config?: string;
};

function parseArgs(argv: string[]): CliArgs | undefined {
  let netlist: string | undefined;
  const out: Omit<CliArgs, "netlist"> = { autoTop: false };
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i].replace(/^--/, "-");
    if (a === "-top" && i + 1 < argv.length) out.top = argv[++i];
    else if (a === "-auto-top") out.autoTop = true;
    else if (a === "-file" && i + 1 < argv.length) out.file = argv[++i];
    else if (a === "-config" && i + 1 < argv.length) out.config = argv[++i];
    else if (!a.startsWith("-") && netlist === undefined) netlist = a;
    else {
      console.error(`Unknown option: "${a}"`);
      return undefined;
    }
  }
  return netlist === undefined ? undefined : { netlist, ...out };
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  if (!args) {
    console.error(USAGE);
    process.exit(1);
  }
  const cfg = loadConfig(args.config);
  const outJson = args.file ?? cfg.output;
  const design = readNetlist(args.netlist, { top: args.top, autoTop: args.autoTop });
  try {
    const result = analyzeDesign(design, cfg);
    writeReport(outJson, result.document);
    console.error(`OCLA analysis: ${result.qualified} qualified core(s), report written to ${outJson}`);
  } catch (e) {
    if (e instanceof AnalysisAbort) writeReport(outJson, e.document);
    throw e;
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
