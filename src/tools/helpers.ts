// Argv fragments shared by the per-tool builders. Each returns discrete tokens;
// nothing here ever joins caller input into a string that a shell would parse.

/** `-p <package>` when a workspace package is named. */
export function packageScope(pkg: string | undefined): string[] {
  return pkg ? ["-p", pkg] : [];
}

export function flag(enabled: boolean, token: string): string[] {
  return enabled ? [token] : [];
}

/** `<name> <value>` when the value is present. */
export function option(name: string, value: string | undefined): string[] {
  return value ? [name, value] : [];
}

/** `--features a,b,c`, keeping the caller's order. */
export function featureList(features: readonly string[]): string[] {
  return features.length > 0 ? ["--features", features.join(",")] : [];
}

/** Tokens addressed to the program cargo launches, placed after `--`. */
export function passthrough(tokens: readonly string[]): string[] {
  return tokens.length > 0 ? ["--", ...tokens] : [];
}
