import {CliCommand} from "../util/index.js";
import {GlobalArgs} from "../options/index.js";
import {eta} from "./eta/index.js";
import {scan} from "./scan/index.js";
import {status} from "./status/index.js";

// eslint-disable-next-line @typescript-eslint/no-explicit-any
export const cmds: CliCommand<any, GlobalArgs>[] = [eta, scan, status];
