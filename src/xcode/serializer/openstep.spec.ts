import { SerializationError } from "../../common/errors";
import { Logger } from "../../common/logger";
import { type FieldSerializer, PBXObject } from "../pbx/object";
import { ProductType } from "../pbx/product-type";
import { Project } from "../pbx/project";
import { ProxyType } from "../pbx/targets";
import { StableGIDGenerator } from "./gid";
import { escapeString, serializeProject } from "./openstep";

function buildProject(): Project {
  const project = new Project({ name: "App" });
  project.mainGroup.getOrCreateFileReferenceForPath("lib/a.m");
  const library = project.createNativeTarget("Lib", ProductType.StaticLibrary);
  const app = project.createNativeTarget("App", ProductType.Application);
  app.createDependencyOn(library, ProxyType.TargetReference, project);
  app.buildConfigurationList.getOrCreateBuildConfiguration("Debug").buildSettings = {
    PRODUCT_NAME: "App",
    OTHER_CFLAGS: "-DFOO=1 -DBAR",
  };
  return project;
}

class UnknownObject extends PBXObject {
  readonly isa = "PBXUnknownObject";

  get identity(): string {
    return "unknown";
  }

  serializeInto(serializer: FieldSerializer): void {
    serializer.addField("name", "unknown");
  }
}

describe("escapeString", () => {
  it("leaves plain words unquoted", () => {
    expect(escapeString("Debug")).toBe("Debug");
    expect(escapeString("lib/a.m")).toBe("lib/a.m");
    expect(escapeString("DEBUG_1")).toBe("DEBUG_1");
  });

  it("quotes and escapes everything else", () => {
    expect(escapeString("")).toBe('""');
    expect(escapeString("$(inherited) -DFOO")).toBe('"$(inherited) -DFOO"');
    expect(escapeString('say "hi"')).toBe('"say \\"hi\\""');
    expect(escapeString("a\\b")).toBe('"a\\\\b"');
    expect(escapeString("set -e\nexec x")).toBe('"set -e\\nexec x"');
  });
});

describe("StableGIDGenerator", () => {
  it("counts up for objects with the same identity", () => {
    const generator = new StableGIDGenerator();
    const first = generator.generate(new UnknownObject());
    const second = generator.generate(new UnknownObject());

    expect(first).toHaveLength(24);
    expect(first.slice(0, 16)).toBe(second.slice(0, 16));
    expect(first.slice(16)).toBe("00000000");
    expect(second.slice(16)).toBe("00000001");
  });
});

describe("serializeProject", () => {
  beforeEach(() => {
    Logger.writer = () => {};
  });

  it("writes the archive header and root object", () => {
    const output = serializeProject(buildProject());

    expect(output.startsWith("// !$*UTF8*$!\n{\n\tarchiveVersion = 1;\n\tclasses = {\n\t};\n\tobjectVersion = 46;\n")).toBe(
      true,
    );
    expect(output).toMatch(/\trootObject = [0-9A-F]{24} \/\* Project object \*\/;\n}$/);
  });

  it("writes sections in a fixed order", () => {
    const output = serializeProject(buildProject());
    const sections = [...output.matchAll(/\/\* Begin (\w+) section \*\//g)].map((match) => match[1]);

    expect(sections).toEqual([
      "PBXContainerItemProxy",
      "PBXFileReference",
      "PBXGroup",
      "PBXNativeTarget",
      "PBXProject",
      "PBXTargetDependency",
      "XCBuildConfiguration",
      "XCConfigurationList",
    ]);
  });

  it("writes file references on one line", () => {
    const output = serializeProject(buildProject());
    expect(output).toMatch(
      /\t\t[0-9A-F]{24} \/\* a\.m \*\/ = \{isa = PBXFileReference; lastKnownFileType = sourcecode\.c\.objc; path = a\.m; sourceTree = "<group>"; \};\n/,
    );
  });

  it("quotes build settings that need it", () => {
    const output = serializeProject(buildProject());
    expect(output).toContain('OTHER_CFLAGS = "-DFOO=1 -DBAR";');
    expect(output).toContain("PRODUCT_NAME = App;");
    expect(output).toContain("hasScannedForEncodings = 0;");
  });

  it("is deterministic for identical graphs", () => {
    expect(serializeProject(buildProject())).toBe(serializeProject(buildProject()));
  });

  it("rejects objects it has no section for", () => {
    expect(() => serializeProject(new UnknownObject())).toThrow(SerializationError);
  });
});
