import type { Logger } from "~clients/logger";
import type { z } from "zod";
import { parseArgv } from "zx";

export type ParseArgsOptions<T extends z.ZodType> = {
  logger: Logger;
  schema: T;
  rawArgs?: string[];
  // Values used for flags absent from the command line, e.g. from the environment
  fallbacks?: Record<string, string | undefined>;
};

const sanitizeArgs = (rawArgs: string[]): string[] =>
  rawArgs.filter((arg) => arg !== "--");

const definedEntries = (
  values: Record<string, string | undefined>
): Record<string, string> =>
  Object.fromEntries(
    Object.entries(values).filter(
      (entry): entry is [string, string] =>
        entry[1] !== undefined && entry[1] !== ""
    )
  );

/**
 * Parses and validates CLI arguments using a Zod schema.
 * Command-line flags win over fallbacks; schema defaults apply last.
 * @throws If arguments fail schema validation
 */
export const parseArgs = <T extends z.ZodType>({
  logger,
  schema,
  rawArgs,
  fallbacks,
}: ParseArgsOptions<T>): z.infer<T> => {
  logger.debug("Parsing CLI arguments...");
  const parsedArgs = parseArgv(sanitizeArgs(rawArgs ?? process.argv.slice(2)));
  const args = schema.parse({
    ...definedEntries(fallbacks ?? {}),
    ...parsedArgs,
  });
  logger.debug("Parsed args", { args });
  return args;
};
