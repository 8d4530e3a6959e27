import { Command, Option } from "commander";
import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import {
  formatComponentsOutput,
  type ComponentsOutputMode,
} from "./application/format-components-output.js";
import { createStderrLogger, parseLogLevel, type LogLevel } from "./application/logger.js";
import { runComponentsCommand } from "./application/run-components-command.js";

const program = new Command();
const packageJsonPath = resolve(dirname(fileURLToPath(import.meta.url)), "../package.json");
const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, "utf8"));
const version =
  typeof packageJson === "object" &&
  packageJson !== null &&
  "version" in packageJson &&
  typeof packageJson.version === "string"
    ? packageJson.version
    : "0.0.0";

const parseCount = (value: string, fallback: number): number => {
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
};

program
  .name("scc-kit")
  .description("Strongly connected components and condensation queries for directed graphs")
  .version(version);

program
  .command("components")
  .argument("<file>", "JSON graph: adjacency list, adjacency map or { vertices, edges }")
  .addOption(
    new Option(
      "--log-level <level>",
      "log verbosity: silent, error, warn, info, debug (logs are written to stderr)",
    )
      .choices(["silent", "error", "warn", "info", "debug"])
      .default(parseLogLevel(process.env["SCC_KIT_LOG_LEVEL"])),
  )
  .addOption(
    new Option(
      "--output <mode>",
      "output mode: summary (default) or json (every component with its queries)",
    )
      .choices(["summary", "json"])
      .default("summary"),
  )
  .option("--json", "shortcut for --output json")
  .option("--top <count>", "number of cycles to list in summary mode", "5")
  .addOption(
    new Option("--vertex-order <order>", "vertex order inside components")
      .choices(["sorted", "discovery"])
      .default("sorted"),
  )
  .option("--no-self-loops", "leave self-loop singletons out of the cycle list")
  .action(
    (
      file: string,
      options: {
        logLevel: LogLevel;
        output: ComponentsOutputMode;
        json?: boolean;
        top: string;
        vertexOrder: "sorted" | "discovery";
        selfLoops: boolean;
      },
    ) => {
      const logger = createStderrLogger(options.logLevel);
      const result = runComponentsCommand(
        file,
        {
          vertexOrder: options.vertexOrder,
          includeSelfLoopCycles: options.selfLoops,
        },
        logger,
      );

      if (!result.available) {
        logger.error(`cannot analyze ${result.sourcePath}: ${result.reason}`);
        process.exitCode = 1;
        return;
      }

      const outputMode: ComponentsOutputMode = options.json === true ? "json" : options.output;
      process.stdout.write(
        `${formatComponentsOutput(result, outputMode, parseCount(options.top, 5))}\n`,
      );
    },
  );

if (process.argv.length <= 2) {
  program.outputHelp();
  process.exit(0);
}

const executablePath = process.argv[0] ?? "";
const scriptPath = process.argv[1] ?? "";

const argv =
  process.argv[2] === "--"
    ? [executablePath, scriptPath, ...process.argv.slice(3)]
    : process.argv;

if (argv.length <= 2) {
  program.outputHelp();
  process.exit(0);
}

await program.parseAsync(argv);
