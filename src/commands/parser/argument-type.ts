import type { CommandSender, HostDirectory } from "../../host/types";

export type SuggestionContext = {
  sender: CommandSender;
  directory: HostDirectory;
};

export type ArgumentContext = SuggestionContext & {
  /** Name of the argument being parsed. */
  argument: string;
};

/**
 * Named parser and suggester for one kind of argument value.
 *
 * `parse` throws an `ArgumentValueError` when the input cannot be converted.
 * `suggest` returns candidates starting with `partial`; callers treat a throw as no suggestions.
 */
export type ArgumentType<T = unknown> = {
  readonly name: string;
  /** Consumes every remaining token, joined by a single space. */
  readonly greedy?: boolean;
  parse(context: ArgumentContext, input: string): T;
  suggest(context: SuggestionContext, partial: string): readonly string[];
};

export function startsWithIgnoreCase(value: string, prefix: string): boolean {
  return value.toLowerCase().startsWith(prefix.toLowerCase());
}
