import chalk from "chalk";
import { formatTimestamp, type ScoredEvent } from "@streamcut/core";

/** Short detail column for an event, by kind */
export function describeEvent(event: ScoredEvent): string {
  switch (event.kind) {
    case "volume_peak":
      return "volume peak";
    case "loud_segment":
      return `loud ${formatTimestamp(event.segmentStart)}-${formatTimestamp(event.segmentEnd)}`;
    case "comment_spike":
      return `${event.count} comments (avg ${event.average.toFixed(1)})`;
    case "user_reaction":
      return `${event.uniqueUsers} users`;
    case "keyword_hit":
      return `"${event.keyword}" ${chalk.dim(event.text)}`;
    case "merged":
      return `${event.members.length} × ${event.primaryKind}`;
  }
}

export function printEventTable(events: readonly ScoredEvent[], title = "Highlights"): void {
  console.log();
  console.log(chalk.bold.cyan(title));
  console.log(chalk.dim("─".repeat(60)));

  if (events.length === 0) {
    console.log(chalk.dim("  (none)"));
  }

  for (let i = 0; i < events.length; i++) {
    const event = events[i];
    const sources = event.sources.join("+") || "unknown";
    console.log(
      `${chalk.yellow(`[${i + 1}]`)} ${formatTimestamp(event.timestamp).padStart(8)}  ` +
        `${chalk.bold(event.score.toFixed(1).padStart(5))}  ${chalk.dim(sources.padEnd(13))} ${describeEvent(event)}`
    );
  }
  console.log();
}
