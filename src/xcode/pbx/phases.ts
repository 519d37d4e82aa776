import { type FieldSerializer, PBXObject } from "./object";
import type { Reference } from "./references";

// Xcode writes this mask for every phase it creates
const DEFAULT_BUILD_ACTION_MASK = 2147483647;

/**
 * A file of a build phase together with per-file settings such as COMPILER_FLAGS
 */
export class BuildFile extends PBXObject {
  readonly isa = "PBXBuildFile";
  readonly fileRef: Reference;
  readonly settings: Record<string, string> | undefined;
  private phaseComment: string;

  constructor(fileRef: Reference, phaseComment: string, settings?: Record<string, string>) {
    super();
    this.fileRef = fileRef;
    this.phaseComment = phaseComment;
    this.settings = settings;
  }

  get comment(): string {
    return `${this.fileRef.comment ?? ""} in ${this.phaseComment}`;
  }

  get identity(): string {
    return `${this.fileRef.identity}@${this.phaseComment}`;
  }

  serializeInto(serializer: FieldSerializer): void {
    serializer.addField("fileRef", this.fileRef);
    if (this.settings) {
      serializer.addField("settings", this.settings);
    }
  }
}

export abstract class BuildPhase extends PBXObject {
  readonly files: BuildFile[] = [];
  buildActionMask = DEFAULT_BUILD_ACTION_MASK;
  runOnlyForDeploymentPostprocessing = false;

  /**
   * Distinguishes phases of the same kind within one target
   */
  mnemonic = "";

  addFile(fileRef: Reference, settings?: Record<string, string>): BuildFile {
    const buildFile = new BuildFile(fileRef, this.comment ?? this.isa, settings);
    this.files.push(buildFile);
    return buildFile;
  }

  get identity(): string {
    return `${this.isa}:${this.mnemonic}`;
  }

  serializeInto(serializer: FieldSerializer): void {
    serializer.addField("buildActionMask", this.buildActionMask);
    serializer.addField("files", this.files);
    serializer.addField("runOnlyForDeploymentPostprocessing", this.runOnlyForDeploymentPostprocessing);
  }
}

export class SourcesBuildPhase extends BuildPhase {
  readonly isa = "PBXSourcesBuildPhase";

  get comment(): string {
    return "Sources";
  }
}

export class ShellScriptBuildPhase extends BuildPhase {
  readonly isa = "PBXShellScriptBuildPhase";
  readonly shellScript: string;
  readonly shellPath: string;
  name: string | undefined;
  inputPaths: string[] = [];
  outputPaths: string[] = [];
  showEnvVarsInLog = false;

  constructor(options: { shellScript: string; shellPath?: string; name?: string }) {
    super();
    this.shellScript = options.shellScript;
    this.shellPath = options.shellPath ?? "/bin/sh";
    this.name = options.name;
  }

  get comment(): string {
    return this.name ?? "ShellScript";
  }

  serializeInto(serializer: FieldSerializer): void {
    super.serializeInto(serializer);
    serializer.addField("inputPaths", this.inputPaths);
    if (this.name !== undefined) {
      serializer.addField("name", this.name);
    }
    serializer.addField("outputPaths", this.outputPaths);
    serializer.addField("shellPath", this.shellPath);
    serializer.addField("shellScript", this.shellScript);
    serializer.addField("showEnvVarsInLog", this.showEnvVarsInLog);
  }
}
