/**
 * Node Paths
 * `$`-rooted addresses: `.key`, `.'quoted key'` and `[index]` segments
 */

export const ROOT_PATH = '$';

const SPECIAL_CHARACTERS = /[$*.[\]]/;

/** Quote a key containing `$ * . [ ]`; quotes inside are doubled */
export function quotePathKey(key: string): string {
  if (!SPECIAL_CHARACTERS.test(key)) return key;
  return `'${key.replace(/'/g, "''")}'`;
}

export function childPath(parent: string, key: string): string {
  return `${parent}.${quotePathKey(key)}`;
}

export function indexPath(parent: string, index: number): string {
  return `${parent}[${index}]`;
}

/**
 * Immutable builder for paths.
 *
 * @example
 * PathBuilder.root().child('a').index(1).build()
 * // Returns: '$.a[1]'
 */
export class PathBuilder {
  private constructor(private readonly path: string) {}

  static root(): PathBuilder {
    return new PathBuilder(ROOT_PATH);
  }

  child(key: string): PathBuilder {
    return new PathBuilder(childPath(this.path, key));
  }

  index(index: number): PathBuilder {
    if (!Number.isInteger(index) || index < 0) {
      throw new RangeError(`Invalid sequence index: ${index}`);
    }
    return new PathBuilder(indexPath(this.path, index));
  }

  build(): string {
    return this.path;
  }
}
