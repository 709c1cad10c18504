export type FlagSpec = {
  // Flags taking one value; the last occurrence wins.
  readonly values?: readonly string[];
  // Flags taking one value that may repeat.
  readonly lists?: readonly string[];
  readonly usage: string;
};

export type ParsedFlags = {
  readonly values: ReadonlyMap<string, string>;
  readonly lists: ReadonlyMap<string, readonly string[]>;
};

export function parseFlags(command: string, argv: readonly string[], spec: FlagSpec): ParsedFlags {
  const values = new Map<string, string>();
  const lists = new Map<string, string[]>();

  const it = argv[Symbol.iterator]();
  while (true) {
    const next = it.next();
    if (next.done) break;
    const a = next.value;
    if (a === "--help" || a === "-h") throw new Error(`Usage: ${spec.usage}`);
    const isValue = spec.values?.includes(a) ?? false;
    const isList = spec.lists?.includes(a) ?? false;
    if (!isValue && !isList) throw new Error(`${command}: unknown argument '${a}'.\nUsage: ${spec.usage}`);
    const v = it.next();
    if (v.done) throw new Error(`${command}: ${a} requires a value`);
    const key = a.slice(2);
    if (isValue) values.set(key, v.value);
    else lists.set(key, [...(lists.get(key) ?? []), v.value]);
  }
  return { values, lists };
}
