import {Options, Argv} from "yargs";

export type CliCommandOptions<OwnArgs> = Required<{[key in keyof OwnArgs]: Options}>;

// eslint-disable-next-line @typescript-eslint/no-explicit-any
export interface CliCommand<OwnArgs = Record<never, never>, ParentArgs = Record<never, never>, R = any> {
  command: string;
  describe: string;
  examples?: {command: string; description: string}[];
  options?: CliCommandOptions<OwnArgs>;
  handler?: (args: OwnArgs & ParentArgs) => Promise<R>;
}

/**
 * Register a CliCommand type to yargs
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export function registerCommandToYargs(yargs: Argv, cliCommand: CliCommand<any, any>): void {
  yargs.command({
    command: cliCommand.command,
    describe: cliCommand.describe,
    builder: (yargsBuilder) => {
      yargsBuilder.options(cliCommand.options || {});
      if (cliCommand.examples) {
        for (const example of cliCommand.examples) {
          yargsBuilder.example(`$0 ${example.command}`, example.description);
        }
      }
      return yargs;
    },
    // eslint-disable-next-line @typescript-eslint/no-empty-function
    handler: cliCommand.handler || function emptyHandler(): void {},
  });
}
