// Argument parsing for the hearthdeck CLI.
//
//   hearthdeck <code or pasted deck text> [--comp=<code>] [--mode=<format>] [--title=<title>]

export interface CliArgs {
  /** Everything that is not a flag, joined back together. */
  text: string;
  comp?: string;
  mode?: string;
  title?: string;
}

const FLAG_RE = /^--(comp|mode|title)=(.*)$/s;

export function parseCliArgs(argv: string[]): CliArgs {
  const args: CliArgs = { text: "" };
  const rest: string[] = [];

  for (const arg of argv) {
    const match = FLAG_RE.exec(arg);
    if (!match) {
      rest.push(arg);
      continue;
    }
    const value = (match[2] ?? "").trim();
    if (!value) continue;
    switch (match[1]) {
      case "comp":
        args.comp = value;
        break;
      case "mode":
        args.mode = value;
        break;
      case "title":
        args.title = value;
        break;
    }
  }

  args.text = rest.join(" ").trim();
  return args;
}
