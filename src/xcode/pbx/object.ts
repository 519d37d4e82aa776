/**
 * Values that can be written into a pbxproj object body. Objects are written as references to
 * their global ID and serialized in their own section.
 */
export type FieldValue = string | number | boolean | PBXObject | readonly FieldValue[] | FieldDictionary;

export interface FieldDictionary {
  readonly [key: string]: FieldValue;
}

/**
 * Receives the fields of one object while it is being serialized
 */
export interface FieldSerializer {
  addField(name: string, value: FieldValue | undefined): void;

  /**
   * Writes the object's global ID without a comment, as Xcode does for remoteGlobalIDString
   */
  addRawIdField(name: string, object: PBXObject): void;

  /**
   * Registers the object for serialization and returns its global ID
   */
  globalId(object: PBXObject): string;
}

export abstract class PBXObject {
  abstract readonly isa: string;

  /**
   * Text written after references to this object, usually its name
   */
  get comment(): string | undefined {
    return undefined;
  }

  /**
   * Stable description of the object, hashed into its global ID. Objects that may share one get
   * distinct IDs from a counter, so this only needs to be deterministic.
   */
  abstract get identity(): string;

  abstract serializeInto(serializer: FieldSerializer): void;
}
