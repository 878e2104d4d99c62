/**
 * Qualified names of the classes, constructors and interfaces seen so far.
 * `Name.prop` is a definition site only when `Name` is registered.
 */
export class ClassRegistry {
  private readonly names = new Set<string>();

  record(name: string): void {
    this.names.add(name);
  }

  has(name: string): boolean {
    return this.names.has(name);
  }

  get size(): number {
    return this.names.size;
  }
}
