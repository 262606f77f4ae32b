import { Command } from "commander";
import chalk from "chalk";
import { loadConfig } from "../config/loader.js";
import type { Config, RawSettings } from "../config/schema.js";
import { CronService } from "../cron/service.js";
import type { RunOutcome } from "../runner/types.js";
import { Supervisor } from "../supervisor/service.js";
import { createLogger } from "../utils/logger.js";
import { encodeBase64, errorMessage, formatDuration } from "../utils/helpers.js";

const VERSION = "0.1.0";

interface SourceOptions {
  config?: string;
  schedule?: string;
  command?: string;
  tz?: string;
}

function withSourceOptions(cmd: Command): Command {
  return cmd
    .option("-c, --config <file>", "JSON settings file (plain text values)")
    .option("-s, --schedule <expr>", "Cron expression, overrides CRON_EXPRESSION (plain text)")
    .option("-x, --command <cmd>", "Command line, overrides CRON_CMD (plain text)")
    .option("--tz <tz>", "Timezone, overrides CRON_TZ");
}

function resolveConfig(opts: SourceOptions): Config | null {
  const overrides: RawSettings = { schedule: opts.schedule, command: opts.command, tz: opts.tz };
  try {
    return loadConfig({ configPath: opts.config, overrides });
  } catch (err) {
    console.error(chalk.red(`Error: ${errorMessage(err)}`));
    process.exitCode = 1;
    return null;
  }
}

/** Exit status of the `once` command for a finished firing. */
export function exitCodeFor(outcome: RunOutcome | null): number {
  if (!outcome) return 1;
  if (outcome.status === "skipped" || outcome.status === "success") return 0;
  if (outcome.status === "timeout") return 1;
  return outcome.finalExitCode && outcome.finalExitCode > 0 ? outcome.finalExitCode : 1;
}

export function buildProgram(): Command {
  const program = new Command();
  program.name("cronvisor").description("Run a command on a cron schedule with deadlines, restarts and output logging").version(VERSION);

  withSourceOptions(program.command("run", { isDefault: true }))
    .description("Start the scheduler in the foreground until SIGINT/SIGTERM")
    .action(async (opts: SourceOptions) => {
      const config = resolveConfig(opts);
      if (!config) return;
      const logger = createLogger();
      const supervisor = new Supervisor(config, { logger });
      supervisor.start();

      await new Promise<void>((resolve) => {
        let signals = 0;
        const onSignal = (signal: NodeJS.Signals) => {
          signals += 1;
          if (signals > 1) {
            logger.warn(`Received ${signal} again; exiting without waiting for running firings`);
            process.exit(signal === "SIGINT" ? 130 : 143);
          }
          logger.info(`Received ${signal}`);
          supervisor.stop().then(resolve, resolve);
        };
        process.on("SIGINT", onSignal);
        process.on("SIGTERM", onSignal);
      });
    });

  withSourceOptions(program.command("once"))
    .description("Run a single firing now and exit with its exit code")
    .action(async (opts: SourceOptions) => {
      const config = resolveConfig(opts);
      if (!config) return;
      const supervisor = new Supervisor(config, { logger: createLogger() });
      const outcome = await supervisor.runOnce();
      await supervisor.stop();
      process.exitCode = exitCodeFor(outcome);
    });

  withSourceOptions(program.command("next"))
    .description("Print the upcoming firing times")
    .option("-n, --count <count>", "How many instants to print", "5")
    .action((opts: SourceOptions & { count: string }) => {
      const config = resolveConfig(opts);
      if (!config) return;
      const count = Number(opts.count);
      if (!Number.isInteger(count) || count < 1) {
        console.error(chalk.red("Error: --count must be a positive integer"));
        process.exitCode = 1;
        return;
      }
      const service = new CronService(config.schedule, () => undefined);
      const now = Date.now();
      console.log(chalk.cyan(`${config.schedule.expr} (${config.schedule.tz ?? "local"})`));
      for (const at of service.nextRuns(count, new Date(now))) {
        console.log(`${at.toISOString()}  in ${formatDuration(at.getTime() - now)}`);
      }
      if (config.job.killAfterMs !== null) console.log(chalk.gray(`Each firing is killed after ${formatDuration(config.job.killAfterMs)}`));
    });

  program.command("encode")
    .description("Print the base64 form expected by CRON_EXPRESSION and CRON_CMD")
    .argument("<text>")
    .action((text: string) => {
      console.log(encodeBase64(text));
    });

  return program;
}
