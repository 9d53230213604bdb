// `${NAME}`, `${NAME:-default}`, `${NAME?error}` and bare `$NAME`; `$$` is a literal dollar.
const VARIABLE_REFERENCE = /\$\$|\$\{([A-Za-z_][A-Za-z0-9_]*)(?:[:?+-][^}]*)?\}|\$([A-Za-z_][A-Za-z0-9_]*)/g;

export function extractComposeVariables(manifest: string): string[] {
  const names = new Set<string>();

  for (const match of manifest.matchAll(VARIABLE_REFERENCE)) {
    const name = match[1] ?? match[2];
    if (name) {
      names.add(name);
    }
  }

  return [...names].sort();
}
