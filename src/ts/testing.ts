/**
 * Testing utilities for csv2json
 */

export interface GenerateCSVOptions {
  rows: number;
  /** Column specs as "name:type"; types: string, integer, float, null, quoted, name, city */
  columns: string[];
  seed?: number;
  includeHeader?: boolean;
}

/** Simple seeded random number generator */
class SeededRandom {
  private seed: number;

  constructor(seed: number) {
    this.seed = seed;
  }

  next(): number {
    this.seed = (this.seed * 1103515245 + 12345) & 0x7fffffff;
    return this.seed / 0x7fffffff;
  }

  nextInt(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  pick<T>(array: readonly T[]): T {
    const item = array[this.nextInt(0, array.length - 1)];
    if (item === undefined) throw new RangeError("Cannot pick from an empty array");
    return item;
  }
}

const FIRST_NAMES = ["Alice", "Bob", "Charlie", "Diana", "Eve", "Frank"] as const;
const LAST_NAMES = ["Smith", "Johnson", "Williams", "Brown", "Jones", "Davis"] as const;
const CITIES = ["NYC", "LA", "Chicago", "Houston", "Phoenix", "Philadelphia"] as const;

/** Generate CSV text, one row per line, ending with a newline */
export function generateCSV(options: GenerateCSVOptions): string {
  const rng = new SeededRandom(options.seed ?? Date.now());
  const lines: string[] = [];

  const columns = options.columns.map((col) => {
    const [name = col, type = "string"] = col.split(":");
    return { name, type };
  });

  if (options.includeHeader !== false) {
    lines.push(columns.map((c) => c.name).join(","));
  }

  for (let i = 0; i < options.rows; i++) {
    const row = columns.map((col) => {
      switch (col.type) {
        case "integer":
          return String(rng.nextInt(0, 10000));
        case "float":
          return (rng.next() * 1000).toFixed(2);
        case "null":
          return "";
        case "quoted":
          return `"${rng.pick(FIRST_NAMES)}, ""${rng.pick(LAST_NAMES)}"""`;
        case "name":
          return `${rng.pick(FIRST_NAMES)} ${rng.pick(LAST_NAMES)}`;
        case "city":
          return rng.pick(CITIES);
        case "string":
        default:
          return `value_${rng.nextInt(1, 1000)}`;
      }
    });

    lines.push(row.join(","));
  }

  return lines.join("\n") + "\n";
}
