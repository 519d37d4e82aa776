import { BuildLabel } from "./label";

describe("BuildLabel", () => {
  it("splits package and target names", () => {
    const label = new BuildLabel("//app/ios:App");
    expect(label.packageName).toBe("app/ios");
    expect(label.targetName).toBe("App");
    expect(label.asFileName).toBe("app/ios/App");
    expect(label.asFullTargetName).toBe("app-ios-App");
  });

  it("uses the last path component when there is no colon", () => {
    const label = new BuildLabel("//app/ios");
    expect(label.targetName).toBe("ios");
    expect(label.packageName).toBe("app/ios");
  });

  it("treats the root package as empty", () => {
    const label = new BuildLabel("//:tool");
    expect(label.packageName).toBe("");
    expect(label.asFullTargetName).toBe("tool");
  });

  it("has no target name for a trailing slash", () => {
    const label = new BuildLabel("//app/");
    expect(label.targetName).toBeUndefined();
    expect(label.asFileName).toBeUndefined();
    expect(label.asFullTargetName).toBeUndefined();
  });

  it("compares by value", () => {
    const a = new BuildLabel("//a:a");
    const b = new BuildLabel("//b:b");
    expect(a.equals(new BuildLabel("//a:a"))).toBe(true);
    expect(a.compare(b)).toBe(-1);
    expect(b.compare(a)).toBe(1);
    expect(a.compare(new BuildLabel("//a:a"))).toBe(0);
  });
});
