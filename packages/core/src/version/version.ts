/**
 * @module version/version
 * Four-part version numbers parsed from version folder names.
 */

/**
 * An immutable `major.minor.build.revision` version.
 *
 * Ordering is lexicographic over the four components, so
 * `1.0.0.0 < 1.0.0.1 < 1.1.0.0 < 2.0.0.0`.
 *
 * @example
 * ```typescript
 * const a = new Version(1, 2);
 * const b = new Version(1, 10);
 * a.CompareTo(b); // -1
 * a.toString();   // "1.2.0.0"
 * ```
 */
export class Version {
  readonly Major: number;
  readonly Minor: number;
  readonly Build: number;
  readonly Revision: number;

  constructor(major: number, minor = 0, build = 0, revision = 0) {
    for (const component of [major, minor, build, revision]) {
      if (!Number.isSafeInteger(component) || component < 0) {
        throw new RangeError(`Version components must be non-negative integers, got ${component}`);
      }
    }
    this.Major = major;
    this.Minor = minor;
    this.Build = build;
    this.Revision = revision;
    Object.freeze(this);
  }

  /**
   * Compares two versions. Suitable as an `Array.prototype.sort` comparator.
   * @returns -1, 0 or 1
   */
  static Compare(a: Version, b: Version): number {
    return a.CompareTo(b);
  }

  /**
   * @returns -1 if this version sorts before `other`, 1 if after, 0 if equal
   */
  CompareTo(other: Version): number {
    const left = this.Components();
    const right = other.Components();
    for (let i = 0; i < left.length; i++) {
      if (left[i] !== right[i]) {
        return left[i] < right[i] ? -1 : 1;
      }
    }
    return 0;
  }

  Equals(other: Version): boolean {
    return this.CompareTo(other) === 0;
  }

  /** The four components in significance order */
  Components(): [number, number, number, number] {
    return [this.Major, this.Minor, this.Build, this.Revision];
  }

  toString(): string {
    return this.Components().join('.');
  }
}
