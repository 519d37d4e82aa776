import { hex8, stableHash } from "../../common/helpers";
import type { PBXObject } from "../pbx/object";

export interface GIDGenerator {
  generate(object: PBXObject): string;
}

/**
 * Derives 24 hex digit IDs from the object's isa and identity. Objects that hash alike get
 * increasing suffixes in the order they are generated, so identical graphs serialized in the
 * same order get identical IDs.
 */
export class StableGIDGenerator implements GIDGenerator {
  private reserved = new Map<string, number>();

  generate(object: PBXObject): string {
    const prefix = `${hex8(stableHash(object.isa))}${hex8(stableHash(object.identity))}`;
    const counter = this.reserved.get(prefix) ?? 0;
    this.reserved.set(prefix, counter + 1);
    return `${prefix}${hex8(counter)}`;
  }
}
