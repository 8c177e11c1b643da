/** Lowercase ASCII alphanumerics; every other character becomes `-`. */
export function slugify(name: string): string {
  const slug = name
    .toLowerCase()
    .replace(/[^a-z0-9]/g, "-")
    .replace(/^-+|-+$/g, "");
  return slug || "case";
}

/** POSIX single-quote escaping for a command line typed into the guest shell. */
export function quoteShellArg(arg: string): string {
  if (/^[A-Za-z0-9_\-./=:,@%+]+$/.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}
