import { runCli } from "./cli/run";

await runCli();
