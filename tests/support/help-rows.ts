/** One help row in the default layout: a 50-column signature, then the description. */
export function row(signature: string, description = ""): string {
  return `${signature.padEnd(50)}${description}\n`;
}

export const HELP_ROW = row("    -h, --help", "Print this help and exit");

export const FETCH_ROOT_HELP = [
  "Download files over HTTP\n",
  "\n",
  "Usage: fetch <ARGS> [OPTIONS] [COMMAND]\n",
  "\nArgs:\n",
  row("    URL...", "Address to download"),
  "\nCommands:\n",
  row("    config", "Manage settings"),
  "\nOptions:\n",
  row("    -t, --time=<SECS>", "Time limit per request"),
  row("        --max-time=<max-time>", "Time limit for the whole run"),
  row("        --format=<format>", "values: json, text"),
  HELP_ROW,
  "\nRun 'fetch <command>' with '-h/--help' flag to get help of any command.\n",
].join("");
