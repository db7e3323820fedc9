import { loadDotEnvIfPresent } from "@pitchcheck/shared";

import { noveltyCommand } from "./commands/novelty.js";

type CommandResult = void | Promise<void>;

function printHelp(): void {
  console.log("pitchcheck CLI");
  console.log("");
  console.log("Commands:");
  console.log("  novelty <repoUrl> (--summary <text> | --transcript <file>) [--json]");
}

async function main(): Promise<void> {
  loadDotEnvIfPresent();

  let [cmd, ...rest] = process.argv.slice(2);
  // npm forwards the argument separator through to the script as a literal "--".
  if (cmd === "--") {
    [cmd, ...rest] = rest;
  }

  let result: CommandResult;
  switch (cmd) {
    case "novelty":
      result = noveltyCommand(rest);
      break;
    default:
      printHelp();
      result = undefined;
      break;
  }

  await result;
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
