/**
 * Identity of one Bazel target, e.g. `//app/ios:App`.
 *
 * Two labels are equal when their string values are equal; use `value` as the key in maps.
 * See https://bazel.build/concepts/labels
 */
export class BuildLabel {
  readonly value: string;

  constructor(value: string) {
    this.value = value;
  }

  get targetName(): string | undefined {
    const colon = this.value.lastIndexOf(":");
    if (colon !== -1) {
      return this.value.slice(colon + 1);
    }

    const components = this.value.split("/");
    const last = components[components.length - 1];
    return last ? last : undefined;
  }

  get packageName(): string {
    let pkg = this.value.split(":")[0];
    if (pkg.startsWith("//")) {
      pkg = pkg.slice(2);
    }
    if (pkg === "" || pkg.endsWith("/")) {
      return "";
    }
    return pkg;
  }

  /**
   * `package/target`, or undefined for labels without a target name
   */
  get asFileName(): string | undefined {
    const target = this.targetName;
    if (target === undefined) {
      return undefined;
    }
    return `${this.packageName}/${target}`;
  }

  /**
   * Dash-separated form used when short names collide: `//a/b:c` -> `a-b-c`
   */
  get asFullTargetName(): string | undefined {
    const target = this.targetName;
    if (target === undefined) {
      return undefined;
    }
    const pkg = this.packageName.replace(/\//g, "-");
    return pkg ? `${pkg}-${target}` : target;
  }

  equals(other: BuildLabel): boolean {
    return this.value === other.value;
  }

  compare(other: BuildLabel): number {
    if (this.value < other.value) {
      return -1;
    }
    return this.value > other.value ? 1 : 0;
  }

  toString(): string {
    return this.value;
  }
}
