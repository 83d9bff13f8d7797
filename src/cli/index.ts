import { Command } from "commander";
import { handlersCommand } from "./commands/handlers.js";
import { main as startApp } from "../index.js";
import { configExists, getDefaultConfigPath } from "../config/loader.js";
import { readFileSync, existsSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import { getErrorMessage } from "../utils/errors.js";

const PackageJsonSchema = z.object({ version: z.string() });

function findPackageVersion(): string {
  let dir = dirname(fileURLToPath(import.meta.url));
  for (let i = 0; i < 10; i++) {
    const candidate = join(dir, "package.json");
    if (existsSync(candidate)) {
      const parsed = PackageJsonSchema.safeParse(JSON.parse(readFileSync(candidate, "utf-8")));
      return parsed.success ? parsed.data.version : "0.0.0";
    }
    dir = dirname(dir);
  }
  return "0.0.0";
}

const program = new Command();

program
  .name("relaybot")
  .description("Telegram bridge with hot-reloadable auto-response handlers and an LLM fallback")
  .version(findPackageVersion());

program
  .command("start")
  .description("Connect to Telegram and start relaying messages")
  .option("-c, --config <path>", "Config file path", getDefaultConfigPath())
  .option("--webui", "Enable WebUI server (overrides config)")
  .option("--webui-port <port>", "WebUI server port (default: 7777)")
  .action(async (options: { config: string; webui?: boolean; webuiPort?: string }) => {
    try {
      if (!configExists(options.config)) {
        console.error("❌ Configuration not found");
        console.error(`   Expected file: ${options.config}`);
        console.error("\n💡 Copy config.example.yaml to config.yaml and fill it in");
        process.exit(1);
      }

      // Picked up by the config loader's environment overrides
      if (options.webui) {
        process.env.RELAYBOT_WEBUI_ENABLED = "true";
      }
      if (options.webuiPort) {
        process.env.RELAYBOT_WEBUI_PORT = options.webuiPort;
      }

      await startApp(options.config);
    } catch (error) {
      console.error("Error:", getErrorMessage(error));
      process.exit(1);
    }
  });

program
  .command("handlers")
  .description("Load the auto-response handlers once and report each file")
  .option("-c, --config <path>", "Config file path", getDefaultConfigPath())
  .option("-d, --dir <path>", "Handler directory (overrides config)")
  .action(async (options: { config: string; dir?: string }) => {
    try {
      process.exitCode = await handlersCommand(options);
    } catch (error) {
      console.error("Error:", getErrorMessage(error));
      process.exit(1);
    }
  });

program.action(() => {
  program.help();
});

program.parse(process.argv);
