import { ProductType } from "./pbx/product-type";
import { Project } from "./pbx/project";
import { ProxyType } from "./pbx/targets";
import { serializeProject } from "./serializer/openstep";
import { formatSummary, summarizeProject } from "./summary";

function buildProject(): Project {
  const project = new Project({ name: "App" });
  const clean = project.createLegacyTarget({
    name: "_bazel_clean_",
    buildToolPath: "/bin/true",
    buildArguments: "",
    buildWorkingDirectory: "",
  });
  const app = project.createNativeTarget("App", ProductType.Application);
  app.createDependencyOn(clean, ProxyType.TargetReference, project);
  for (const list of [project.buildConfigurationList, app.buildConfigurationList, clean.buildConfigurationList]) {
    list.getOrCreateBuildConfiguration("Release");
    list.getOrCreateBuildConfiguration("Debug");
  }
  return project;
}

describe("summarizeProject", () => {
  it("lists targets and configurations of a serialized project", () => {
    const summary = summarizeProject(serializeProject(buildProject()));

    expect(summary).toEqual({
      targets: [
        { name: "App", isa: "PBXNativeTarget", productType: "com.apple.product-type.application", dependencies: 1 },
        { name: "_bazel_clean_", isa: "PBXLegacyTarget", productType: undefined, dependencies: 0 },
      ],
      configurations: ["Debug", "Release"],
    });
  });

  it("formats one line per item", () => {
    const text = formatSummary({
      targets: [{ name: "App", isa: "PBXNativeTarget", productType: "com.apple.product-type.application", dependencies: 1 }],
      configurations: ["Debug"],
    });
    expect(text).toBe(
      ["Targets:", "  App (com.apple.product-type.application, 1 dependencies)", "Configurations:", "  Debug"].join("\n"),
    );
  });
});
