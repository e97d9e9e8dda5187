export function getArg(argv: string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  for (let i = 0; i < argv.length; i += 1) {
    const a = argv[i];

    if (a === `--${name}`) {
      const next = argv[i + 1];
      if (typeof next !== "string" || next.startsWith("--")) {
        throw new Error(`Expected value after --${name}`);
      }
      return next;
    }

    if (a.startsWith(prefix)) {
      return a.slice(prefix.length);
    }
  }
  return undefined;
}
