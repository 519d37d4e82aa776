import { ProductType } from "./product-type";
import { Project } from "./project";
import { Group, SourceTree, VariantGroup } from "./references";

describe("Group", () => {
  it("returns the same reference for the same source tree and path", () => {
    const group = new Group({ name: "mainGroup", sourceTree: SourceTree.Group });
    const first = group.getOrCreateFileReference(SourceTree.Group, "a.m");
    const second = group.getOrCreateFileReference(SourceTree.Group, "a.m");

    expect(second).toBe(first);
    expect(group.children).toHaveLength(1);
  });

  it("keeps references with different source trees apart", () => {
    const group = new Group({ name: "mainGroup", sourceTree: SourceTree.Group });
    const relative = group.getOrCreateFileReference(SourceTree.Group, "a.m");
    const absolute = group.getOrCreateFileReference(SourceTree.Absolute, "a.m");

    expect(absolute).not.toBe(relative);
    expect(group.children).toHaveLength(2);
  });

  it("creates one group per directory", () => {
    const group = new Group({ name: "mainGroup", sourceTree: SourceTree.Group });
    const reference = group.getOrCreateFileReferenceForPath("lib/src/a.m");
    group.getOrCreateFileReferenceForPath("lib/src/b.m");

    expect(reference.pathInGroupTree).toBe("lib/src/a.m");
    expect(group.children).toHaveLength(1);
    expect(group.allSources.map((source) => source.name)).toEqual(["a.m", "b.m"]);
  });

  it("resolves files inside a bundle to the bundle", () => {
    const group = new Group({ name: "mainGroup", sourceTree: SourceTree.Group });
    const reference = group.getOrCreateFileReferenceForPath("app/Assets.xcassets/Icon.png");

    expect(reference.name).toBe("Assets.xcassets");
    expect(reference.fileType).toBe("folder.assetcatalog");
  });

  it("puts localized files in a variant group named after the file", () => {
    const group = new Group({ name: "mainGroup", sourceTree: SourceTree.Group });
    const english = group.getOrCreateFileReferenceForPath("app/en.lproj/Main.strings");
    const french = group.getOrCreateFileReferenceForPath("app/fr.lproj/Main.strings");

    expect(english.parent).toBe(french.parent);
    expect(english.parent).toBeInstanceOf(VariantGroup);
    expect(english.name).toBe("en");
    expect(french.path).toBe("fr.lproj/Main.strings");
  });
});

describe("Project", () => {
  it("puts version groups below their directory", () => {
    const project = new Project({ name: "App" });
    const versionGroup = project.getOrCreateVersionGroupForPath("app/Model.xcdatamodeld", "wrapper.xcdatamodel");

    expect(versionGroup.name).toBe("Model.xcdatamodeld");
    expect(versionGroup.versionGroupType).toBe("wrapper.xcdatamodel");
    expect(project.getOrCreateVersionGroupForPath("app/Model.xcdatamodeld", "wrapper.xcdatamodel")).toBe(versionGroup);
  });

  it("adds product references for native targets", () => {
    const project = new Project({ name: "App" });
    const target = project.createNativeTarget("App", ProductType.Application);

    expect(target.productReference?.path).toBe("App.app");
    expect(target.productReference?.sourceTree).toBe(SourceTree.BuiltProductsDir);
    expect(target.productReference?.isInputFile).toBe(false);
    expect(project.productsGroup.children).toEqual([target.productReference]);
  });
});
