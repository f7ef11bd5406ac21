/**
 * Minimal `{id, name}` identity. Rich entities (champions, devices, skins, abilities)
 * extend it, and lookups hand out plain instances as stand-ins for anything the current
 * cache entry cannot resolve.
 */
export class CacheObject {
  static readonly DEFAULT_ID = 0;
  static readonly DEFAULT_NAME = "";

  constructor(
    readonly id: number = CacheObject.DEFAULT_ID,
    readonly name: string = CacheObject.DEFAULT_NAME
  ) {}

  get hasId(): boolean {
    return this.id !== CacheObject.DEFAULT_ID;
  }

  get hasName(): boolean {
    return this.name !== CacheObject.DEFAULT_NAME;
  }

  equals(other: CacheObject): boolean {
    if (this.hasId && other.hasId) return this.id === other.id;
    return this.name === other.name;
  }

  toString(): string {
    return this.hasName ? this.name : `#${this.id}`;
  }

  toJSON(): { id: number; name: string } {
    return { id: this.id, name: this.name };
  }
}
