/**
 * Command-line flag parsing for the enrichment script
 */

/**
 * Value of `--name=value`, kept whole when it contains `=`
 */
export function parseFlag(args: readonly string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  return args.find(a => a.startsWith(prefix))?.slice(name.length + 3);
}
