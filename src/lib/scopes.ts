/**
 * OAuth scope URIs and the canonical scope set sent to token endpoints.
 */

export const Scope = {
  CLOUD_PLATFORM: 'https://www.googleapis.com/auth/cloud-platform',
  CLOUD_PLATFORM_READ_ONLY: 'https://www.googleapis.com/auth/cloud-platform.read-only',
  BIG_QUERY: 'https://www.googleapis.com/auth/bigquery',
  BIG_QUERY_INSERT_DATA: 'https://www.googleapis.com/auth/bigquery.insertdata',
  BIG_QUERY_READ_ONLY: 'https://www.googleapis.com/auth/bigquery.readonly',
  CLOUD_TASKS: 'https://www.googleapis.com/auth/cloud-tasks',
  DATASTORE: 'https://www.googleapis.com/auth/datastore',
  STORAGE_FULL_CONTROL: 'https://www.googleapis.com/auth/devstorage.full_control',
  STORAGE_READ_ONLY: 'https://www.googleapis.com/auth/devstorage.read_only',
  STORAGE_READ_WRITE: 'https://www.googleapis.com/auth/devstorage.read_write',
  PUB_SUB: 'https://www.googleapis.com/auth/pubsub',
  SPANNER_ADMIN: 'https://www.googleapis.com/auth/spanner.admin',
  SPANNER_DATA: 'https://www.googleapis.com/auth/spanner.data',
  FIREBASE_DATABASE: 'https://www.googleapis.com/auth/firebase.database',
} as const;

export type ScopeUri = (typeof Scope)[keyof typeof Scope];

/**
 * Ordered, deduplicated set of scope URIs.
 *
 * Canonical form is the URIs sorted and joined by a single space; two sets are
 * equal iff their canonical forms are.
 */
export class Scopes implements Iterable<string> {
  private readonly uris: string[] = [];

  constructor(scopes: Iterable<string> = []) {
    for (const scope of scopes) this.insert(scope);
  }

  static get CLOUD_PLATFORM_ADMIN(): Scopes {
    return new Scopes([Scope.CLOUD_PLATFORM]);
  }

  static get CLOUD_PLATFORM_READ_ONLY(): Scopes {
    return new Scopes([Scope.CLOUD_PLATFORM_READ_ONLY]);
  }

  /** Inverse of {@link Scopes.encode}; extra whitespace is ignored */
  static parse(encoded: string): Scopes {
    return new Scopes(encoded.split(/\s+/).filter((part) => part.length > 0));
  }

  static from(scopes: Scopes | Iterable<string> | string): Scopes {
    if (scopes instanceof Scopes) return new Scopes(scopes);
    if (typeof scopes === 'string') return Scopes.parse(scopes);
    return new Scopes(scopes);
  }

  /** Union of two sets, as a new set */
  static union(existing: Scopes, added: Scopes | Iterable<string>): Scopes {
    const merged = new Scopes(existing);
    for (const scope of added) merged.insert(scope);
    return merged;
  }

  /** Adds a scope, keeping canonical order. Returns false if it was already present. */
  insert(scope: string): boolean {
    const uri = scope.trim();
    if (!uri) return false;

    let low = 0;
    let high = this.uris.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      const current = this.uris[mid];
      if (current === uri) return false;
      if (current < uri) low = mid + 1;
      else high = mid;
    }

    this.uris.splice(low, 0, uri);
    return true;
  }

  has(scope: string): boolean {
    return this.uris.includes(scope);
  }

  get size(): number {
    return this.uris.length;
  }

  get isEmpty(): boolean {
    return this.uris.length === 0;
  }

  values(): IterableIterator<string> {
    return this.uris.values();
  }

  [Symbol.iterator](): IterableIterator<string> {
    return this.values();
  }

  encode(): string {
    return this.uris.join(' ');
  }

  equals(other: Scopes): boolean {
    return this.encode() === other.encode();
  }

  toArray(): string[] {
    return [...this.uris];
  }

  toString(): string {
    return this.encode();
  }
}
