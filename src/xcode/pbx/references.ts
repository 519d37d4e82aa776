import { compareStrings } from "../../common/helpers";
import { bundleUTIForPath, lastPathComponent, pathExtension, utiForPath } from "../file-types";
import { type FieldSerializer, PBXObject } from "./object";

export enum SourceTree {
  Group = "<group>",
  Absolute = "<absolute>",
  BuiltProductsDir = "BUILT_PRODUCTS_DIR",
  SDKRoot = "SDKROOT",
  SourceRoot = "SOURCE_ROOT",
  DeveloperDir = "DEVELOPER_DIR",
}

type ReferenceOptions = {
  name: string;
  path?: string;
  sourceTree: SourceTree;
  parent?: Group;
};

/**
 * Base for file references and groups. Every reference except the main group has exactly one
 * parent group.
 */
export abstract class Reference extends PBXObject {
  readonly name: string;
  readonly path: string | undefined;
  readonly sourceTree: SourceTree;
  readonly parent: Group | undefined;
  serializesName = false;

  constructor(options: ReferenceOptions) {
    super();
    this.name = options.name;
    this.path = options.path;
    this.sourceTree = options.sourceTree;
    this.parent = options.parent;
  }

  get comment(): string | undefined {
    return this.name;
  }

  get identity(): string {
    return `${this.parent?.identity ?? ""}/${this.sourceTree}:${this.path ?? this.name}`;
  }

  /**
   * Path from the root of the group tree, joining the paths of the group-relative ancestors
   */
  get pathInGroupTree(): string {
    const own = this.path ?? "";
    if (this.sourceTree !== SourceTree.Group || !this.parent) {
      return own;
    }
    const parentPath = this.parent.pathInGroupTree;
    if (!parentPath) {
      return own;
    }
    return own ? `${parentPath}/${own}` : parentPath;
  }

  serializeInto(serializer: FieldSerializer): void {
    if (this.serializesName) {
      serializer.addField("name", this.name);
    }
    serializer.addField("path", this.path);
    serializer.addField("sourceTree", this.sourceTree);
  }
}

/**
 * A single file. Inputs record the type Xcode last saw; outputs declare it explicitly.
 */
export class FileReference extends Reference {
  readonly isa = "PBXFileReference";
  isInputFile = true;
  fileTypeOverride: string | undefined;

  get fileType(): string | undefined {
    return this.fileTypeOverride ?? utiForPath(this.path ?? this.name);
  }

  serializeInto(serializer: FieldSerializer): void {
    super.serializeInto(serializer);
    if (this.isInputFile) {
      serializer.addField("lastKnownFileType", this.fileType ?? "text");
    } else {
      serializer.addField("explicitFileType", this.fileType);
    }
  }
}

function sourceTreePathKey(sourceTree: SourceTree, path: string): string {
  return `${sourceTree}\u0000${path}`;
}

export class Group extends Reference {
  readonly isa: string = "PBXGroup";
  readonly children: Reference[] = [];

  private groupsByName = new Map<string, Group>();
  private variantGroupsByName = new Map<string, VariantGroup>();
  private versionGroupsByName = new Map<string, VersionGroup>();
  private fileReferencesBySourceTreePath = new Map<string, FileReference>();

  getOrCreateChildGroupByName(name: string, path: string | undefined, sourceTree = SourceTree.Group): Group {
    const existing = this.groupsByName.get(name);
    if (existing) {
      return existing;
    }
    const group = new Group({ name, path, sourceTree, parent: this });
    this.groupsByName.set(name, group);
    this.children.push(group);
    return group;
  }

  getOrCreateChildVariantGroupByName(name: string, sourceTree = SourceTree.Group): VariantGroup {
    const existing = this.variantGroupsByName.get(name);
    if (existing) {
      return existing;
    }
    const group = new VariantGroup({ name, sourceTree, parent: this });
    group.serializesName = true;
    this.variantGroupsByName.set(name, group);
    this.children.push(group);
    return group;
  }

  getOrCreateChildVersionGroupByName(name: string, path: string | undefined, sourceTree = SourceTree.Group): VersionGroup {
    const existing = this.versionGroupsByName.get(name);
    if (existing) {
      return existing;
    }
    const group = new VersionGroup({ name, path, sourceTree, parent: this });
    this.versionGroupsByName.set(name, group);
    this.children.push(group);
    return group;
  }

  /**
   * Returns the file reference for (sourceTree, path), creating it on first use
   */
  getOrCreateFileReference(sourceTree: SourceTree, path: string, name?: string): FileReference {
    const key = sourceTreePathKey(sourceTree, path);
    const existing = this.fileReferencesBySourceTreePath.get(key);
    if (existing) {
      return existing;
    }
    const reference = new FileReference({ name: name ?? lastPathComponent(path), path, sourceTree, parent: this });
    if (name !== undefined) {
      reference.serializesName = true;
    }
    this.fileReferencesBySourceTreePath.set(key, reference);
    this.children.push(reference);
    return reference;
  }

  /**
   * Walks a slash-separated directory path, creating a group per component. A component with a
   * bundle extension (`.xcassets`, `.framework`, ...) ends the walk: Xcode treats the bundle as
   * one file, so its reference is returned instead.
   */
  getOrCreateSubgroup(path: string): Group | FileReference {
    if (path === "") {
      return this;
    }
    let group: Group = this;
    for (const component of path.split("/")) {
      const bundle = group.bundleReference(component);
      if (bundle) {
        return bundle;
      }
      group = group.getOrCreateChildGroupByName(component === "" ? "/" : component, component);
    }
    return group;
  }

  /**
   * Creates the groups leading to a file and the file's reference. Files inside a bundle resolve
   * to the bundle. Files inside `<locale>.lproj` become one entry of a variant group named after
   * the file, so each localization shows up under a single item.
   */
  getOrCreateFileReferenceForPath(path: string): FileReference {
    const components = path.split("/");
    const fileName = components[components.length - 1];
    const directories = components.slice(0, -1);

    let localeDirectory: string | undefined;
    if (directories.length > 0 && pathExtension(directories[directories.length - 1]) === "lproj") {
      localeDirectory = directories.pop();
    }

    const parent = this.getOrCreateSubgroup(directories.join("/"));
    if (parent instanceof FileReference) {
      return parent;
    }

    if (localeDirectory !== undefined) {
      const locale = localeDirectory.slice(0, -".lproj".length);
      const variantGroup = parent.getOrCreateChildVariantGroupByName(fileName);
      return variantGroup.getOrCreateFileReference(SourceTree.Group, `${localeDirectory}/${fileName}`, locale);
    }

    return parent.getOrCreateFileReference(SourceTree.Group, fileName);
  }

  /**
   * Every file reference in this group and its descendants
   */
  get allSources(): FileReference[] {
    const references: FileReference[] = [];
    for (const child of this.children) {
      if (child instanceof FileReference) {
        references.push(child);
      } else if (child instanceof Group) {
        references.push(...child.allSources);
      }
    }
    return references;
  }

  serializeInto(serializer: FieldSerializer): void {
    super.serializeInto(serializer);
    serializer.addField(
      "children",
      [...this.children].sort((a, b) => compareStrings(a.name, b.name)),
    );
  }

  private bundleReference(component: string): FileReference | undefined {
    const uti = bundleUTIForPath(component);
    if (uti === undefined) {
      return undefined;
    }
    const reference = this.getOrCreateFileReference(SourceTree.Group, component);
    reference.fileTypeOverride = uti;
    return reference;
  }
}

/**
 * Localized resource group
 */
export class VariantGroup extends Group {
  readonly isa: string = "PBXVariantGroup";
}

/**
 * Versioned group, such as a Core Data `.xcdatamodeld`
 */
export class VersionGroup extends Group {
  readonly isa: string = "XCVersionGroup";
  currentVersion: Reference | undefined;
  versionGroupType = "";

  setCurrentVersionByName(name: string): boolean {
    const reference = this.children.find(
      (child) => child instanceof FileReference && child.sourceTree === SourceTree.Group && child.path === name,
    );
    if (!reference) {
      return false;
    }
    this.currentVersion = reference;
    return true;
  }

  serializeInto(serializer: FieldSerializer): void {
    super.serializeInto(serializer);
    if (this.currentVersion) {
      serializer.addField("currentVersion", this.currentVersion);
    }
    serializer.addField("versionGroupType", this.versionGroupType);
  }
}
