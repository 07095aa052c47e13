export interface CliOptions {
  question?: string;
  /** JSON file holding a `[{ role, content }]` chat transcript. */
  transcriptPath?: string;
  help: boolean;
}

export const USAGE = `Usage:
  kbconnect "<question>"
  kbconnect --transcript <file.json>

Options:
  -t, --transcript <file>  Answer the last message of a JSON chat transcript
  -h, --help               Show this message

Configuration is read from the environment (and a .env file, if present).`;

export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = { help: false };
  const words: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "-h":
      case "--help":
        options.help = true;
        break;
      case "-t":
      case "--transcript": {
        const path = argv[++i];
        if (!path) {
          throw new Error(`${arg} needs a file path`);
        }
        options.transcriptPath = path;
        break;
      }
      default:
        if (arg === undefined) break;
        if (arg.startsWith("-")) {
          throw new Error(`Unknown option: ${arg}`);
        }
        words.push(arg);
    }
  }

  const question = words.join(" ").trim();
  if (question) {
    options.question = question;
  }
  if (!options.help && options.question === undefined && options.transcriptPath === undefined) {
    throw new Error("Provide a question or --transcript <file>");
  }
  if (options.question !== undefined && options.transcriptPath !== undefined) {
    throw new Error("Pass either a question or --transcript, not both");
  }
  return options;
}
