import { createContext } from "./context";
import { runCli } from "./run";

process.exitCode = runCli(process.argv.slice(2), createContext());
