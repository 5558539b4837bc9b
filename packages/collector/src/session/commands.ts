import { formatDetail, formatSummary } from "./report";
import type { ActionCollector } from "./action-collector";

export type CollectorCommandName =
  | "start"
  | "stop"
  | "status"
  | "report"
  | "detail"
  | "save"
  | "scan"
  | "reset"
  | "help";

type CommandHandler = (collector: ActionCollector, args: string[]) => Promise<string[]>;

const COMMAND_ALIASES: ReadonlyMap<string, CollectorCommandName> = new Map([
  ["summary", "report"],
  ["info", "detail"],
]);

const HELP_ENTRIES: ReadonlyArray<readonly [string, string]> = [
  ["start", "Start tracking actions"],
  ["stop", "Stop tracking and save data"],
  ["status", "Show tracking status and active trusts"],
  ["report", "Summary of all collected behavior data"],
  ["detail <name>", "Detailed breakdown for one profile"],
  ["save", "Force save all data to JSON files"],
  ["scan", "Re-scan party for trusts"],
  ["reset", "Clear all collected data"],
  ["help", "Show this help"],
];

const COMMAND_HANDLERS: Record<CollectorCommandName, CommandHandler> = {
  start: async (collector) => {
    collector.start();
    return ["Tracking started."];
  },
  stop: async (collector) => {
    await collector.stop();
    return ["Tracking stopped. Data saved."];
  },
  status: async (collector) => {
    const trusts = collector.classifier.activeTrusts();
    const withData = collector
      .profileSnapshots()
      .filter((profile) => profile.totalSamples > 0).length;
    return [
      `Tracking: ${collector.isTracking ? "ON" : "OFF"}`,
      `Zone: ${collector.currentZone}`,
      `Active trusts: ${trusts.length}`,
      ...trusts.map(
        (trust) => `  ${trust.name} (Entity: ${trust.id}, Model: ${trust.modelId})`,
      ),
      `Profiles with data: ${withData}`,
    ];
  },
  report: async (collector) => formatSummary(collector.profileSnapshots()),
  detail: async (collector, args) => {
    const name = args.join(" ").trim();
    if (!name) {
      return ["Usage: detail <name>"];
    }
    return formatDetail(collector.profileSnapshots(), name);
  },
  save: async (collector) => {
    const summary = await collector.save();
    return [`Saved ${summary.profilesWritten} profile(s) to ${summary.directory}`];
  },
  scan: async (collector) => {
    const registered = collector.scanParty();
    return [`Party scan complete. ${registered.length} new trust(s).`];
  },
  reset: async (collector) => {
    collector.reset();
    return ["All collected data cleared."];
  },
  help: async (collector) => [
    "Commands:",
    ...HELP_ENTRIES.map(([usage, description]) => `  ${usage.padEnd(15)}${description}`),
    "",
    `Data is saved to: ${collector.outputDir}`,
  ],
};

export const isCollectorCommandName = (value: string): value is CollectorCommandName =>
  Object.hasOwn(COMMAND_HANDLERS, value);

export const resolveCollectorCommand = (
  input: string | undefined,
): CollectorCommandName | undefined => {
  const name = (input ?? "help").trim().toLowerCase() || "help";
  const aliased = COMMAND_ALIASES.get(name) ?? name;
  return isCollectorCommandName(aliased) ? aliased : undefined;
};

/**
 * Runs a user command against the collector and returns the lines to display.
 * A missing command name shows help.
 */
export const runCollectorCommand = async (
  collector: ActionCollector,
  input: string | undefined,
  args: string[] = [],
): Promise<string[]> => {
  const command = resolveCollectorCommand(input);
  if (!command) {
    return [`Unknown command: ${input ?? ""}. Try help`];
  }
  return COMMAND_HANDLERS[command](collector, args);
};
