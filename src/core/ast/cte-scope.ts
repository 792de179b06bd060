const normalizeName = (name: string): string => name.toLowerCase();

/**
 * Names of the common table expressions visible at a point of the query.
 * Scopes chain outward: a subquery sees the CTEs of every enclosing query.
 */
export class CteScope {
  static readonly EMPTY = new CteScope(new Set());

  private constructor(
    private readonly names: ReadonlySet<string>,
    private readonly parent?: CteScope
  ) { }

  extend(names: string[]): CteScope {
    if (names.length === 0) return this;
    return new CteScope(new Set(names.map(normalizeName)), this);
  }

  has(name: string): boolean {
    const key = normalizeName(name);
    for (let scope: CteScope | undefined = this; scope; scope = scope.parent) {
      if (scope.names.has(key)) return true;
    }
    return false;
  }
}
