/**
 * One `type=value` assertion of an RDN.
 */
export class Ava {
  public constructor(
    public readonly type: string,
    public readonly normalizedType: string,
    public readonly upValue: string,
    public readonly normalizedValue: string,
    /** The characters this assertion was parsed from. */
    public readonly upName: string,
  ) {}

  public get normalized(): string {
    return `${this.normalizedType}=${this.normalizedValue}`;
  }

  public equals(other: Ava): boolean {
    return this.normalized === other.normalized;
  }

  public toString(): string {
    return this.upName;
  }
}
