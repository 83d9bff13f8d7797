import { existsSync } from "fs";
import { expandPath, loadConfig, configExists } from "../../config/loader.js";
import { HandlersConfigSchema } from "../../config/schema.js";
import { HandlerRegistry, type HandlerLoadReport } from "../../handlers/registry.js";

const green = "\x1b[32m";
const yellow = "\x1b[33m";
const red = "\x1b[31m";
const reset = "\x1b[0m";

export interface HandlersCommandOptions {
  config?: string;
  dir?: string;
}

function formatLoadReport(report: HandlerLoadReport): string[] {
  const lines = [`Handler directory: ${report.directory}`];
  for (const outcome of report.outcomes) {
    switch (outcome.status) {
      case "loaded":
        lines.push(`${green}✓${reset} ${outcome.name}`);
        break;
      case "skipped":
        lines.push(`${yellow}⚠${reset} ${outcome.name}: ${outcome.reason}`);
        break;
      case "error":
        lines.push(`${red}✗${reset} ${outcome.name}: ${outcome.error}`);
        break;
    }
  }
  lines.push(`${report.loaded.length} of ${report.outcomes.length} handler file(s) loaded`);
  return lines;
}

function resolveDirectory(options: HandlersCommandOptions): string {
  if (options.dir) return expandPath(options.dir);
  if (options.config && configExists(options.config)) {
    return expandPath(loadConfig(options.config).handlers.directory);
  }
  return expandPath(HandlersConfigSchema.parse({}).directory);
}

/**
 * Load every handler once, the way the bridge would, and print what happened
 * to each file. Exits non-zero when any file failed to import.
 */
export async function handlersCommand(options: HandlersCommandOptions): Promise<number> {
  const directory = resolveDirectory(options);
  if (!existsSync(directory)) {
    console.error(`❌ Handler directory not found: ${directory}`);
    return 1;
  }

  const registry = new HandlerRegistry({ directory });
  const report = await registry.load();
  for (const line of formatLoadReport(report)) {
    console.log(line);
  }
  return report.outcomes.some((o) => o.status === "error") ? 1 : 0;
}
