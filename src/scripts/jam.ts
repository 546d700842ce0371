import { createInterface } from "readline/promises";
import { config } from "../lib/config";
import { COMMANDS, UsageError, parseCommandLine, runCommand } from "../lib/cli";
import { withJamStore } from "../lib/db";

const USAGE = `Usage: jam <command> [options]

  crawl [--force] [ids...]                       crawl listings, or only the given jams
  list [--type T|--owner O|--id I] [--old|--all] list stored jams (default: current tabletop)
  show ids...                                    show details for jams
  classify [ids...] [--type T]                   set the category of jams
  delete ids...                                  delete jams from the database

Commands: ${COMMANDS.join(", ")}`;

async function prompt(question: string, choices: readonly string[]): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    for (;;) {
      const answer = (await rl.question(`${question} [${choices.join("/")}]: `)).trim().toLowerCase();
      if (choices.includes(answer)) return answer;
      console.log(`Please enter one of: ${choices.join(", ")}`);
    }
  } finally {
    rl.close();
  }
}

async function main() {
  const args = parseCommandLine(process.argv.slice(2));

  await withJamStore(config.dbPath, (store) =>
    runCommand(args, {
      store,
      out: (line) => console.log(line),
      prompt: process.stdin.isTTY ? prompt : undefined,
    })
  );
}

main().catch((err) => {
  if (err instanceof UsageError) {
    console.error(err.message);
    console.error(USAGE);
    process.exit(2);
  }
  console.error("Fatal error:", err instanceof Error ? err.message : err);
  process.exit(1);
});
