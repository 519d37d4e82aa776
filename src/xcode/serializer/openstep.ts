import { SerializationError } from "../../common/errors";
import { compareStrings } from "../../common/helpers";
import { type FieldDictionary, type FieldSerializer, type FieldValue, PBXObject } from "../pbx/object";
import { type GIDGenerator, StableGIDGenerator } from "./gid";

const ARCHIVE_VERSION = "1";
const OBJECT_VERSION = "46";

// Objects of these types are written on a single line
const COMPACT_TYPES = new Set(["PBXBuildFile", "PBXFileReference"]);

// Sections are written in this order; each is sorted by global ID
const SECTION_ORDER = [
  "PBXBuildFile",
  "PBXContainerItemProxy",
  "PBXFileReference",
  "PBXGroup",
  "PBXLegacyTarget",
  "PBXNativeTarget",
  "PBXProject",
  "PBXShellScriptBuildPhase",
  "PBXSourcesBuildPhase",
  "PBXVariantGroup",
  "PBXTargetDependency",
  "XCBuildConfiguration",
  "XCConfigurationList",
  "XCVersionGroup",
];

const UNQUOTED_STRING = /^[A-Z0-9._/]+$/i;

/**
 * Quotes a string unless it consists only of letters, digits, `.`, `_` and `/`
 */
export function escapeString(value: string): string {
  if (UNQUOTED_STRING.test(value)) {
    return value;
  }
  const escaped = value.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n");
  return `"${escaped}"`;
}

type RawValue = string | RawDict | string[];

class RawDict {
  readonly entries = new Map<string, RawValue>();
  readonly compact: boolean;

  constructor(compact: boolean) {
    this.compact = compact;
  }

  write(indent: string): string {
    const { closingSpacer, spacer } = this.spacers(indent);
    let out = "{";
    if (!this.compact) {
      out += spacer;
    }
    out += this.writeContents(indent, spacer);
    out += `${closingSpacer}};`;
    return out;
  }

  protected writeContents(indent: string, spacer: string): string {
    const newIndent = `${indent}\t`;
    let out = "";
    let leadingSpacer = "";
    const keys = [...this.entries.keys()].sort(compareStrings);
    for (const key of keys) {
      const value = this.entries.get(key);
      const escapedKey = escapeString(key);
      if (value instanceof RawDict) {
        out += `${leadingSpacer}${escapedKey} = ${value.write(newIndent)}`;
      } else if (Array.isArray(value)) {
        const itemSpacer = spacer + (this.compact ? "" : "\t");
        out += `${leadingSpacer}${escapedKey} = (`;
        for (const item of value) {
          out += `${itemSpacer}${item},`;
        }
        out += `${spacer});`;
      } else {
        out += `${leadingSpacer}${escapedKey} = ${value ?? ""};`;
      }
      leadingSpacer = spacer;
    }
    return out;
  }

  protected spacers(indent: string): { closingSpacer: string; spacer: string } {
    if (this.compact) {
      return { closingSpacer: " ", spacer: " " };
    }
    const closingSpacer = `\n${indent}`;
    return { closingSpacer, spacer: `${closingSpacer}\t` };
  }
}

class TypedDict extends RawDict {
  readonly gid: string;
  readonly isa: string;
  readonly comment: string;

  constructor(gid: string, isa: string, comment: string | undefined) {
    super(COMPACT_TYPES.has(isa));
    this.gid = gid;
    this.isa = isa;
    this.comment = comment !== undefined ? ` /* ${comment} */` : "";
  }

  get reference(): string {
    return `${this.gid}${this.comment}`;
  }

  writeObject(indent: string): string {
    const { closingSpacer, spacer } = this.spacers(indent);
    let out = `${indent}${this.gid}${this.comment} = {`;
    if (!this.compact) {
      out += spacer;
    }
    out += `isa = ${this.isa};${spacer}`;
    out += this.writeContents(indent, spacer);
    out += `${closingSpacer}};\n`;
    return out;
  }
}

/**
 * Writes a project object graph in the OpenStep property list format used by project.pbxproj.
 *
 * Objects are registered before their fields are visited, so reference cycles (a target
 * dependency pointing back at the project) terminate.
 */
export class OpenStepSerializer implements FieldSerializer {
  private rootObject: PBXObject;
  private gidGenerator: GIDGenerator;
  private globalIds = new Map<PBXObject, string>();
  private objects = new Map<string, TypedDict>();
  private sections = new Map<string, string[]>();
  private current: RawDict | undefined;

  constructor(rootObject: PBXObject, options?: { gidGenerator?: GIDGenerator }) {
    this.rootObject = rootObject;
    this.gidGenerator = options?.gidGenerator ?? new StableGIDGenerator();
  }

  serialize(): string {
    const rootReference = this.serializeObject(this.rootObject, false);

    let out = "// !$*UTF8*$!\n{\n";
    out += `\tarchiveVersion = ${ARCHIVE_VERSION};\n`;
    out += "\tclasses = {\n\t};\n";
    out += `\tobjectVersion = ${OBJECT_VERSION};\n`;
    out += "\tobjects = {\n";
    for (const isa of SECTION_ORDER) {
      out += this.writeSection(isa, "\t\t");
    }
    const unknownTypes = [...this.sections.keys()];
    if (unknownTypes.length > 0) {
      throw new SerializationError("Project contains objects of unsupported types", {
        objectType: unknownTypes.join(", "),
        reason: "no section for object type",
      });
    }
    out += "\t};\n";
    out += `\trootObject = ${rootReference};\n`;
    out += "}";
    return out;
  }

  globalId(object: PBXObject): string {
    return this.serializeObject(object, true);
  }

  addField(name: string, value: FieldValue | undefined): void {
    if (value === undefined) {
      return;
    }
    this.currentDict().entries.set(name, this.toRaw(value));
  }

  addRawIdField(name: string, object: PBXObject): void {
    this.currentDict().entries.set(name, this.serializeObject(object, true));
  }

  private serializeObject(object: PBXObject, rawId: boolean): string {
    const existingId = this.globalIds.get(object);
    if (existingId !== undefined) {
      const existing = this.objects.get(existingId);
      if (!existing) {
        throw new SerializationError("Referenced object was not found", {
          objectType: object.isa,
          reason: `missing object ${existingId}`,
        });
      }
      return rawId ? existing.gid : existing.reference;
    }

    const gid = this.gidGenerator.generate(object);
    const dict = new TypedDict(gid, object.isa, object.comment);
    this.globalIds.set(object, gid);
    this.objects.set(gid, dict);

    const stack = this.current;
    this.current = dict;
    try {
      object.serializeInto(this);
    } finally {
      this.current = stack;
    }

    const section = this.sections.get(object.isa);
    if (section) {
      section.push(gid);
    } else {
      this.sections.set(object.isa, [gid]);
    }

    return rawId ? gid : dict.reference;
  }

  private currentDict(): RawDict {
    if (!this.current) {
      throw new SerializationError("Field added outside of an object", { reason: "no current object" });
    }
    return this.current;
  }

  private toRaw(value: FieldValue): RawValue {
    if (typeof value === "string") {
      return escapeString(value);
    }
    if (typeof value === "number") {
      return String(value);
    }
    if (typeof value === "boolean") {
      return value ? "1" : "0";
    }
    if (value instanceof PBXObject) {
      return this.serializeObject(value, false);
    }
    if (isFieldArray(value)) {
      return value.map((item) => {
        const raw = this.toRaw(item);
        if (typeof raw !== "string") {
          throw new SerializationError("Nested collections are not supported inside arrays", {
            reason: "array item is not a scalar or object",
          });
        }
        return raw;
      });
    }
    return this.toRawDict(value);
  }

  private toRawDict(value: FieldDictionary): RawDict {
    const dict = new RawDict(this.current?.compact ?? false);
    const stack = this.current;
    this.current = dict;
    try {
      for (const [key, item] of Object.entries(value)) {
        dict.entries.set(key, this.toRaw(item));
      }
    } finally {
      this.current = stack;
    }
    return dict;
  }

  private writeSection(isa: string, indent: string): string {
    const gids = this.sections.get(isa);
    if (!gids) {
      return "";
    }
    this.sections.delete(isa);

    let out = `\n/* Begin ${isa} section */\n`;
    for (const gid of [...gids].sort(compareStrings)) {
      const dict = this.objects.get(gid);
      if (!dict) {
        throw new SerializationError("Referenced object was not found", { objectType: isa, reason: `missing object ${gid}` });
      }
      out += dict.writeObject(indent);
    }
    out += `/* End ${isa} section */\n`;
    return out;
  }
}

function isFieldArray(value: FieldValue): value is readonly FieldValue[] {
  return Array.isArray(value);
}

/**
 * Serializes the project rooted at `rootObject` with stable global IDs
 */
export function serializeProject(rootObject: PBXObject): string {
  return new OpenStepSerializer(rootObject).serialize();
}
