import {CliCommand} from "../../util/index.js";
import {GlobalArgs} from "../../options/index.js";
import {scanOptions, ScanArgs} from "./options.js";
import {scanHandler} from "./handler.js";

export const scan: CliCommand<ScanArgs, GlobalArgs> = {
  command: "scan",
  describe: "Count the warning and error lines of node logs",
  examples: [
    {
      command: "scan --logPath ./logs --client execution",
      description: "Scan the execution client logs of the ./logs directory",
    },
  ],
  options: scanOptions,
  handler: scanHandler,
};
