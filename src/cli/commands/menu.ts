/**
 * Default command - pick an event from a menu and generate its text
 */

import * as p from "@clack/prompts";
import { EVENT_KINDS, EVENT_LABELS, eventCommand, type EventOptions } from "./event.js";
import { ensureAnswered } from "../interactive.js";

export async function menuCommand(options: EventOptions): Promise<void> {
  const kind = ensureAnswered(
    await p.select({
      message: "Which event do you want to announce?",
      options: EVENT_KINDS.map((value) => ({ value, label: EVENT_LABELS[value] })),
    })
  );
  await eventCommand(kind, options);
}
