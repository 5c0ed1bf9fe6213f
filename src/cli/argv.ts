// =============================================================================
// ARGV NORMALIZATION
// =============================================================================

// Single-dash long flags are accepted for compatibility with existing job scripts.
const FLAG_ALIASES = new Map<string, string>(Object.entries({
  "-tbss": "--tbss-dir",
  "-sub": "--sub-list",
  "-des": "--design",
  "-con": "--contrast",
  "-template": "--template",
  "-fa": "--fa-threshold",
  "-help": "--help",
  "--non-FA-tbss": "--non-fa-tbss",
}));

/** Rewrites alias flags to their canonical form; nothing after `--` is touched. */
export function normalizeArgv(argv: string[]): string[] {
  const separator = argv.indexOf("--");
  const head = separator === -1 ? argv : argv.slice(0, separator);
  const tail = separator === -1 ? [] : argv.slice(separator);
  return [...head.map((arg) => FLAG_ALIASES.get(arg) ?? arg), ...tail];
}
