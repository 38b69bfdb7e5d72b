export interface ParsedArgs {
  command: string;
  args: Record<string, string>;
  positional: string[];
}

export const BOOLEAN_FLAGS = new Set([
  "help", "version", "verbose", "quiet",
  "summary-only", "no-details", "no-color",
]);

export const KNOWN_FLAGS = new Set([
  ...BOOLEAN_FLAGS,
  "extensions", "format", "output", "render", "concurrency", "fail-on",
]);

export function parseArgs(argv: string[]): ParsedArgs {
  const command = argv[0] || "";
  const args: Record<string, string> = {};
  const positional: string[] = [];

  for (let i = 1; i < argv.length; i++) {
    const arg = argv[i];
    if (arg.startsWith("--")) {
      const key = arg.slice(2);

      if (!KNOWN_FLAGS.has(key)) {
        process.stderr.write(`[rowscope] Warning: unknown flag --${key}\n`);
      }

      if (BOOLEAN_FLAGS.has(key)) {
        args[key] = "true";
      } else {
        if (i + 1 >= argv.length || argv[i + 1].startsWith("--")) {
          process.stderr.write(`[rowscope] Error: --${key} requires a value\n`);
          process.exit(1);
        }
        args[key] = argv[++i] || "";
      }
    } else if (arg.startsWith("-")) {
      const key = arg.slice(1);
      if (key === "h") args["help"] = "true";
      else if (key === "v") args["version"] = "true";
      else args[key] = argv[++i] || "";
    } else {
      positional.push(arg);
    }
  }

  // Engine logger reads this on every call
  if (args["verbose"] === "true") {
    process.env.ROWSCOPE_LOG_LEVEL = "debug";
  } else if (args["quiet"] === "true") {
    process.env.ROWSCOPE_LOG_LEVEL = "error";
  }

  return { command, args, positional };
}
