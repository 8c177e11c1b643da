import { GuestCommand } from "../session/backend";
import { quoteShellArg } from "../utils/text";

export const EXIT_MARKER_PATTERN = /__EXIT:(-?\d+)__/;

export function formatGuestCommand(command: GuestCommand): string {
  return [command.path, ...command.args].map(quoteShellArg).join(" ");
}

/** The line typed at the guest prompt: the command, then its exit status as a marker. */
export function withExitMarker(commandLine: string): string {
  return `${commandLine}; echo __EXIT:$?__`;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function parseExitMarker(text: string): number | null {
  const match = EXIT_MARKER_PATTERN.exec(text);
  return match ? Number.parseInt(match[1], 10) : null;
}

/**
 * Reduces a serial transcript to what the command itself printed: carriage
 * returns, the echoed command line and the shell prompt are dropped, and
 * everything from the exit marker on is cut.
 */
export function sanitizeSerialOutput(raw: string, commandLine: string, prompt: string): string {
  let text = raw.replace(/\r/g, "");
  for (const token of [withExitMarker(commandLine), commandLine]) {
    if (token) text = text.split(token).join("");
  }
  // the prompt marker may be preceded by a hostname on the same line
  if (prompt) text = text.replace(new RegExp(`\\S*${escapeRegExp(prompt)} ?`, "g"), "");
  const marker = EXIT_MARKER_PATTERN.exec(text);
  if (marker) text = text.slice(0, marker.index);
  return text.trim();
}
