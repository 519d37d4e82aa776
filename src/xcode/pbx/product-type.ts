/**
 * Xcode product types that the generator can create native targets for
 */
export enum ProductType {
  StaticLibrary = "com.apple.product-type.library.static",
  DynamicLibrary = "com.apple.product-type.library.dynamic",
  Tool = "com.apple.product-type.tool",
  Bundle = "com.apple.product-type.bundle",
  Framework = "com.apple.product-type.framework",
  StaticFramework = "com.apple.product-type.framework.static",
  Application = "com.apple.product-type.application",
  UnitTest = "com.apple.product-type.bundle.unit-test",
  UIUnitTest = "com.apple.product-type.bundle.ui-testing",
  InAppPurchaseContent = "com.apple.product-type.in-app-purchase-content",
  AppExtension = "com.apple.product-type.app-extension",
  XPCService = "com.apple.product-type.xpc-service",
  Watch1App = "com.apple.product-type.application.watchapp",
  Watch2App = "com.apple.product-type.application.watchapp2",
  Watch1Extension = "com.apple.product-type.watchkit-extension",
  Watch2Extension = "com.apple.product-type.watchkit2-extension",
  TVAppExtension = "com.apple.product-type.tv-app-extension",
}

const EXPLICIT_FILE_TYPES: Record<ProductType, string> = {
  [ProductType.StaticLibrary]: "archive.ar",
  [ProductType.DynamicLibrary]: "compiled.mach-o.dylib",
  [ProductType.Tool]: "compiled.mach-o.executable",
  [ProductType.Bundle]: "wrapper.cfbundle",
  [ProductType.Framework]: "wrapper.framework",
  [ProductType.StaticFramework]: "wrapper.framework.static",
  [ProductType.Application]: "wrapper.application",
  [ProductType.UnitTest]: "wrapper.cfbundle",
  [ProductType.UIUnitTest]: "wrapper.cfbundle",
  [ProductType.InAppPurchaseContent]: "folder",
  [ProductType.AppExtension]: "wrapper.app-extension",
  [ProductType.XPCService]: "wrapper.xpc-service",
  [ProductType.Watch1App]: "wrapper.application",
  [ProductType.Watch2App]: "wrapper.application",
  [ProductType.Watch1Extension]: "wrapper.app-extension",
  [ProductType.Watch2Extension]: "wrapper.app-extension",
  [ProductType.TVAppExtension]: "wrapper.app-extension",
};

export function explicitFileType(productType: ProductType): string {
  return EXPLICIT_FILE_TYPES[productType];
}

/**
 * File name of the product Xcode would build for a target called `name`
 */
export function productName(productType: ProductType, name: string): string {
  switch (productType) {
    case ProductType.StaticLibrary:
      return `lib${name}.a`;
    case ProductType.DynamicLibrary:
      return `lib${name}.dylib`;
    case ProductType.Tool:
      return name;
    case ProductType.Bundle:
      return `${name}.bundle`;
    case ProductType.Framework:
    case ProductType.StaticFramework:
      return `${name}.framework`;
    case ProductType.Application:
    case ProductType.Watch2App:
      return `${name}.app`;
    case ProductType.UnitTest:
    case ProductType.UIUnitTest:
      return `${name}.xctest`;
    case ProductType.InAppPurchaseContent:
      return name;
    case ProductType.XPCService:
      return `${name}.xpc`;
    case ProductType.AppExtension:
    case ProductType.Watch1App:
    case ProductType.Watch1Extension:
    case ProductType.Watch2Extension:
    case ProductType.TVAppExtension:
      return `${name}.appex`;
  }
}

export function isTest(productType: ProductType): boolean {
  return productType === ProductType.UnitTest || productType === ProductType.UIUnitTest;
}

export function isWatchApp(productType: ProductType): boolean {
  return productType === ProductType.Watch1App || productType === ProductType.Watch2App;
}

/**
 * Product type of the extension that ships inside a watch app, if `productType` is one
 */
export function watchAppExtensionType(productType: ProductType): ProductType | undefined {
  switch (productType) {
    case ProductType.Watch1App:
      return ProductType.Watch1Extension;
    case ProductType.Watch2App:
      return ProductType.Watch2Extension;
    default:
      return undefined;
  }
}
