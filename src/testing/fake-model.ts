import { Types } from 'mongoose';

export type FakeDoc = Record<string, unknown>;
type SortSpec = Record<string, 1 | -1>;

interface Update {
  $set?: FakeDoc;
  $setOnInsert?: FakeDoc;
}

function isPlainObject(value: unknown): value is FakeDoc {
  return typeof value === 'object' && value !== null && Object.getPrototypeOf(value) === Object.prototype;
}

function clone(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(clone);
  if (isPlainObject(value)) return cloneDoc(value);
  return value;
}

function cloneDoc(doc: FakeDoc): FakeDoc {
  return Object.fromEntries(Object.entries(doc).map(([k, v]) => [k, clone(v)]));
}

function sameValue(actual: unknown, expected: unknown): boolean {
  if (actual == null || expected == null) return actual == expected;
  return String(actual) === String(expected);
}

function matchesCondition(actual: unknown, expected: unknown): boolean {
  if (isPlainObject(expected)) {
    if ('$in' in expected) {
      const list = expected.$in;
      return Array.isArray(list) && list.some((v) => sameValue(actual, v));
    }
    if ('$ne' in expected) return !sameValue(actual, expected.$ne);
  }
  return sameValue(actual, expected);
}

function matches(doc: FakeDoc, filter: FakeDoc): boolean {
  return Object.entries(filter).every(([key, expected]) => matchesCondition(doc[key], expected));
}

function setPath(doc: FakeDoc, path: string, value: unknown): void {
  const keys = path.split('.');
  let target = doc;
  for (const key of keys.slice(0, -1)) {
    const next = target[key];
    if (!isPlainObject(next)) target[key] = {};
    const child = target[key];
    if (isPlainObject(child)) target = child;
  }
  target[keys[keys.length - 1]] = clone(value);
}

function compareValues(a: unknown, b: unknown): number {
  if (a instanceof Date && b instanceof Date) return a.getTime() - b.getTime();
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  return String(a ?? '').localeCompare(String(b ?? ''));
}

class FakeQuery<T> {
  private sortSpec: SortSpec = {};

  constructor(private readonly resolve: (sort: SortSpec) => T) {}

  sort(spec: SortSpec): this {
    this.sortSpec = spec;
    return this;
  }

  lean(): Promise<T> {
    return Promise.resolve(this.resolve(this.sortSpec));
  }

  exec(): Promise<T> {
    return this.lean();
  }
}

/**
 * In-memory stand-in for the subset of a Mongoose model the services use.
 * Filters support equality, `$in` and `$ne`; updates support `$set` and `$setOnInsert`.
 */
export class FakeModel {
  readonly docs: FakeDoc[] = [];
  private tick = 0;

  constructor(seed: FakeDoc[] = []) {
    seed.forEach((doc) => this.insert(doc));
  }

  private timestamp(): Date {
    this.tick += 1;
    return new Date(Date.UTC(2024, 0, 1, 0, 0, this.tick));
  }

  private insert(doc: FakeDoc): FakeDoc {
    const now = this.timestamp();
    const stored = cloneDoc({ _id: new Types.ObjectId(), createdAt: now, updatedAt: now, ...doc });
    this.docs.push(stored);
    return stored;
  }

  private upsertFrom(filter: FakeDoc, update: Update): FakeDoc {
    const base: FakeDoc = {};
    for (const [key, value] of Object.entries(filter)) {
      if (!isPlainObject(value)) base[key] = value;
    }
    const stored = this.insert({ ...base, ...(update.$setOnInsert ?? {}) });
    this.apply(stored, update);
    return stored;
  }

  private apply(doc: FakeDoc, update: Update): void {
    for (const [path, value] of Object.entries(update.$set ?? {})) setPath(doc, path, value);
    doc.updatedAt = this.timestamp();
  }

  async create(doc: FakeDoc): Promise<FakeDoc> {
    return cloneDoc(this.insert(doc));
  }

  findOne(filter: FakeDoc = {}): FakeQuery<FakeDoc | null> {
    return new FakeQuery(() => {
      const found = this.docs.find((d) => matches(d, filter));
      return found ? cloneDoc(found) : null;
    });
  }

  find(filter: FakeDoc = {}): FakeQuery<FakeDoc[]> {
    return new FakeQuery((sort) => {
      const found = this.docs.filter((d) => matches(d, filter));
      const keys = Object.entries(sort);
      found.sort((a, b) => {
        for (const [key, direction] of keys) {
          const diff = compareValues(a[key], b[key]);
          if (diff !== 0) return diff * direction;
        }
        return 0;
      });
      return found.map(cloneDoc);
    });
  }

  findOneAndUpdate(
    filter: FakeDoc,
    update: Update,
    options: { upsert?: boolean; new?: boolean } = {},
  ): FakeQuery<FakeDoc | null> {
    return new FakeQuery(() => {
      const found = this.docs.find((d) => matches(d, filter));
      if (!found) {
        if (!options.upsert) return null;
        const created = this.upsertFrom(filter, update);
        return options.new ? cloneDoc(created) : null;
      }
      const before = cloneDoc(found);
      this.apply(found, update);
      return options.new ? cloneDoc(found) : before;
    });
  }

  async updateOne(
    filter: FakeDoc,
    update: Update,
    options: { upsert?: boolean } = {},
  ): Promise<{ matchedCount: number; modifiedCount: number; upsertedCount: number }> {
    const found = this.docs.find((d) => matches(d, filter));
    if (found) {
      this.apply(found, update);
      return { matchedCount: 1, modifiedCount: 1, upsertedCount: 0 };
    }
    if (!options.upsert) return { matchedCount: 0, modifiedCount: 0, upsertedCount: 0 };
    this.upsertFrom(filter, update);
    return { matchedCount: 0, modifiedCount: 0, upsertedCount: 1 };
  }

  async updateMany(filter: FakeDoc, update: Update): Promise<{ matchedCount: number; modifiedCount: number }> {
    const found = this.docs.filter((d) => matches(d, filter));
    found.forEach((d) => this.apply(d, update));
    return { matchedCount: found.length, modifiedCount: found.length };
  }

  async deleteOne(filter: FakeDoc): Promise<{ deletedCount: number }> {
    const index = this.docs.findIndex((d) => matches(d, filter));
    if (index < 0) return { deletedCount: 0 };
    this.docs.splice(index, 1);
    return { deletedCount: 1 };
  }

  async deleteMany(filter: FakeDoc): Promise<{ deletedCount: number }> {
    const before = this.docs.length;
    const kept = this.docs.filter((d) => !matches(d, filter));
    this.docs.splice(0, this.docs.length, ...kept);
    return { deletedCount: before - kept.length };
  }
}
