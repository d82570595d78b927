/**
 * Pick a free name, appending `.001`, `.002`, ... to the stem when taken.
 */
export function uniqueName(base: string, taken: (name: string) => boolean): string {
  if (!taken(base)) return base;
  const stem = base.replace(/\.\d{3}$/, "");
  for (let i = 1; ; i++) {
    const candidate = `${stem}.${String(i).padStart(3, "0")}`;
    if (!taken(candidate)) return candidate;
  }
}
