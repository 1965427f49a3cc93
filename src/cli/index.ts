import { loadConfig } from "../config";
import { runCheckAll, runCheckUser, runRegister, runRemove, runServe, runStatus } from "../core/commands";
import { createAppContext } from "../core/context";
import type { AppContextOverrides } from "../core/context";
import { createRunId, Logger, MetricsRegistry } from "../observability";

export type CommandName = "serve" | "check-all" | "check" | "register" | "remove" | "status";

export interface ParsedCliArgs {
  command: CommandName;
  configPath?: string;
  userId?: number;
  username?: string;
  secret?: string;
  skipVerify: boolean;
  ignoreHttpsErrors: boolean;
  intervalMinutes?: number;
}

const HELP_TEXT = `
Usage:
  lab-monitor <command> [options]

Commands:
  serve                      Run the scheduler and the Telegram bot until interrupted
  check-all                  Run one monitoring pass over every active user
  check --user <id>          Check one user now
  register --user <id> --username <u> --secret <s> [--skip-verify]
  remove --user <id>
  status [--user <id>]

Options:
  --config <path>            Optional path to JSON config file
  --interval-minutes <n>     Override the polling interval
  --ignore-https-errors      Ignore TLS certificate errors (use only when required)
  -h, --help                 Show this help
`;

const COMMANDS: readonly CommandName[] = ["serve", "check-all", "check", "register", "remove", "status"];

function parseCommand(raw: string | undefined): CommandName | undefined {
  return COMMANDS.find((command) => command === raw);
}

function optionValue(argv: string[], flag: string): string | undefined {
  const index = argv.indexOf(flag);
  return index >= 0 ? argv[index + 1] : undefined;
}

function optionInt(argv: string[], flag: string): number | undefined {
  const raw = optionValue(argv, flag);
  const parsed = raw ? Number.parseInt(raw, 10) : undefined;
  return parsed !== undefined && Number.isFinite(parsed) ? parsed : undefined;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  return {
    command,
    configPath: optionValue(argv, "--config"),
    userId: optionInt(argv, "--user"),
    username: optionValue(argv, "--username"),
    secret: optionValue(argv, "--secret"),
    skipVerify: argv.includes("--skip-verify"),
    ignoreHttpsErrors: argv.includes("--ignore-https-errors"),
    intervalMinutes: optionInt(argv, "--interval-minutes"),
  };
}

function requireOption<T>(value: T | undefined, flag: string, command: CommandName): T {
  if (value === undefined) {
    throw new Error(`${command} requires ${flag}`);
  }
  return value;
}

export async function runCli(argv: string[], overrides: AppContextOverrides = {}): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  let config = loadConfig(parsed.configPath);
  if (parsed.ignoreHttpsErrors) {
    config = {
      ...config,
      ignoreHttpsErrors: true,
    };
  }
  if (parsed.intervalMinutes !== undefined) {
    config = {
      ...config,
      pollIntervalMinutes: parsed.intervalMinutes,
    };
  }

  const runId = createRunId();
  const metrics = new MetricsRegistry();
  const logger = new Logger({ component: "cli", runId });
  const context = createAppContext(runId, config, logger, metrics, overrides);

  logger.info("command_start", {
    command: parsed.command,
    userId: parsed.userId,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
    intervalMinutes: config.pollIntervalMinutes,
    deliveryMode: config.deliveryMode,
  });

  try {
    switch (parsed.command) {
      case "serve":
        await runServe({ ...context, logger: logger.child("serve") });
        break;
      case "check-all":
        await runCheckAll({ ...context, logger: logger.child("check_all") });
        break;
      case "check":
        await runCheckUser(
          { ...context, logger: logger.child("check") },
          requireOption(parsed.userId, "--user", parsed.command),
        );
        break;
      case "register":
        await runRegister(
          { ...context, logger: logger.child("register") },
          {
            userId: requireOption(parsed.userId, "--user", parsed.command),
            username: requireOption(parsed.username, "--username", parsed.command),
            secret: requireOption(parsed.secret, "--secret", parsed.command),
            verify: !parsed.skipVerify,
          },
        );
        break;
      case "remove":
        await runRemove(
          { ...context, logger: logger.child("remove") },
          requireOption(parsed.userId, "--user", parsed.command),
        );
        break;
      case "status":
        await runStatus({ ...context, logger: logger.child("status") }, parsed.userId);
        break;
    }

    logger.info("command_complete", { command: parsed.command });
    return 0;
  } finally {
    await context.store.close();
    metrics.printSummary();
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
