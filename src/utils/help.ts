import ansis from "ansis";

export function showHelp(): void {
  console.log(`
${ansis.bold("readyrun")} - Run dependent shell tasks, starting each once its dependencies are ready

${ansis.bold("Usage:")}
  readyrun [config] [patterns] [flags]

${ansis.bold("Config:")}
  An INI file, tasks.ini by default. Each section is a task:

    [serve]
    command = npm run dev
    work_dir = packages/app
    depends_on = build, db
    ready_check = listening on port

${ansis.bold("Patterns:")}
  [serve]               Run serve and everything it depends on
  [api:*,!api:slow]     Run api tasks except api:slow
  [!docs]               Run every task except docs

${ansis.bold("Flags:")}
  -q, --quiet           Suppress task output
  --no-prefix           Disable output prefixes
  --prefix=<str>        Custom prefix
  --grace=<ms>          Wait before force-killing on shutdown (default 5000)
  --exit-on-stall       Exit when remaining tasks can never start
  -h, --help            Show this help
  `);
}
