import type {Options, Argv} from "yargs";

export interface CliExample {
  command: string;
  description?: string;
}

export interface CliOptionDefinition<T> extends Options {
  // Keeps the yargs parser type in line with the declared arg type
  type: T extends string
    ? "string"
    : T extends number
      ? "number"
      : T extends boolean
        ? "boolean"
        : T extends Array<unknown>
          ? "array"
          : never;
}

/** Required args must have a default or be demanded from the user */
export type CliCommandOptions<Args> = Required<{
  [K in keyof Args]: undefined extends Args[K]
    ? CliOptionDefinition<Args[K]>
    : CliOptionDefinition<Args[K]> & (Required<Pick<Options, "default">> | {demandOption: true});
}>;

export interface CliCommand<OwnArgs, ParentArgs = Record<never, never>, R = unknown> {
  command: string;
  describe: string;
  examples?: CliExample[];
  options: CliCommandOptions<OwnArgs>;
  handler: (args: OwnArgs & ParentArgs) => Promise<R>;
}

export function registerCommandToYargs(yargs: Argv, cliCommand: CliCommand<any, any>): void {
  yargs.command({
    command: cliCommand.command,
    describe: cliCommand.describe,
    builder: (yargsBuilder) => {
      yargsBuilder.options(cliCommand.options);
      for (const {command, description} of cliCommand.examples ?? []) {
        yargsBuilder.example(`$0 ${command}`, description ?? "");
      }
      return yargsBuilder;
    },
    handler: async (args) => {
      await cliCommand.handler(args);
    },
  });
}
