import { z } from "zod";

/**
 * Shape of the rule entries document written by the Bazel aspect.
 *
 * Rule kinds form a closed union: each kind group accepts only the attributes that make sense
 * for it, and unknown keys are rejected instead of silently ignored.
 */

export const fileInfoSchema = z
  .object({
    path: z.string(),
    src: z.boolean().default(true),
    root: z.string().optional(),
    is_dir: z.boolean().optional(),
  })
  .strict();

const compileAttributes = {
  copts: z.array(z.string()).optional(),
  defines: z.array(z.string()).optional(),
  compiler_defines: z.array(z.string()).optional(),
  pch: fileInfoSchema.optional(),
  bridging_header: fileInfoSchema.optional(),
  enable_modules: z.boolean().optional(),
  swiftc_opts: z.array(z.string()).optional(),
  swift_language_version: z.string().optional(),
  swift_toolchain: z.string().optional(),
  has_swift_info: z.boolean().optional(),
  datamodels: z.array(fileInfoSchema).optional(),
  supporting_files: z.array(fileInfoSchema).optional(),
};

const libraryAttributesSchema = z.object(compileAttributes).strict();

const bundleAttributesSchema = z
  .object({
    ...compileAttributes,
    binary: z.string().optional(),
    launch_storyboard: fileInfoSchema.optional(),
    has_swift_dependency: z.boolean().optional(),
  })
  .strict();

const testAttributesSchema = z
  .object({
    ...compileAttributes,
    test_host: z.string().optional(),
    xctest: z.boolean().optional(),
    xctest_app: z.string().optional(),
    has_swift_dependency: z.boolean().optional(),
  })
  .strict();

const emptyAttributesSchema = z.object({}).strict();

const deploymentTargetSchema = z
  .object({
    platform: z.enum(["ios", "macos", "tvos", "watchos"]),
    os_version: z.string(),
  })
  .strict();

const includeSchema = z
  .object({
    path: z.string(),
    recursive: z.boolean().default(false),
  })
  .strict();

const baseRecordSchema = z.object({
  label: z.string().min(1),
  srcs: z.array(fileInfoSchema).default([]),
  non_arc_srcs: z.array(fileInfoSchema).default([]),
  framework_imports: z.array(fileInfoSchema).default([]),
  artifacts: z.array(fileInfoSchema).default([]),
  secondary_artifacts: z.array(fileInfoSchema).default([]),
  deps: z.array(z.string()).default([]),
  weak_deps: z.array(z.string()).default([]),
  extensions: z.array(z.string()).default([]),
  bundle_id: z.string().optional(),
  bundle_name: z.string().optional(),
  extension_bundle_id: z.string().optional(),
  build_file: z.string().optional(),
  deployment_target: deploymentTargetSchema.optional(),
  includes: z.array(includeSchema).default([]),
  swift_transitive_modules: z.array(fileInfoSchema).default([]),
  objc_module_maps: z.array(fileInfoSchema).default([]),
  module_name: z.string().optional(),
  swift_defines: z.array(z.string()).default([]),
  xcode_version: z.string().optional(),
});

export const LIBRARY_KINDS = ["objc_library", "swift_library"] as const;

export const BUNDLE_KINDS = [
  "ios_application",
  "_ios_application",
  "tvos_application",
  "_tvos_application",
  "objc_binary",
  "ios_extension",
  "_ios_extension",
  "tvos_extension",
  "_tvos_extension",
  "ios_framework",
  "apple_watch1_extension",
  "apple_watch2_extension",
  "_test_host_",
] as const;

export const TEST_KINDS = ["apple_unit_test", "apple_ui_test", "ios_test"] as const;

const libraryRecordSchema = baseRecordSchema
  .extend({ kind: z.enum(LIBRARY_KINDS), attr: libraryAttributesSchema.default({}) })
  .strict();

const bundleRecordSchema = baseRecordSchema
  .extend({ kind: z.enum(BUNDLE_KINDS), attr: bundleAttributesSchema.default({}) })
  .strict();

const testRecordSchema = baseRecordSchema
  .extend({ kind: z.enum(TEST_KINDS), attr: testAttributesSchema.default({}) })
  .strict();

const testSuiteRecordSchema = baseRecordSchema
  .extend({ kind: z.literal("test_suite"), attr: emptyAttributesSchema.default({}) })
  .strict();

const filegroupRecordSchema = baseRecordSchema
  .extend({ kind: z.literal("filegroup"), attr: emptyAttributesSchema.default({}) })
  .strict();

export const ruleRecordSchema = z.discriminatedUnion("kind", [
  libraryRecordSchema,
  bundleRecordSchema,
  testRecordSchema,
  testSuiteRecordSchema,
  filegroupRecordSchema,
]);

export const ruleEntriesDocumentSchema = z
  .object({
    rules: z.array(ruleRecordSchema),
  })
  .strict();

export type FileInfo = z.infer<typeof fileInfoSchema>;
export type RuleRecord = z.infer<typeof ruleRecordSchema>;
export type RuleKind = RuleRecord["kind"];
export type RuleEntriesDocument = z.infer<typeof ruleEntriesDocumentSchema>;
export type IncludePath = z.infer<typeof includeSchema>;

export type LibraryAttributes = z.infer<typeof libraryAttributesSchema>;
export type BundleAttributes = z.infer<typeof bundleAttributesSchema>;
export type TestAttributes = z.infer<typeof testAttributesSchema>;

/**
 * Attributes any kind may carry. Kinds that don't accept a key simply never have it set.
 */
export type RuleAttributes = Partial<LibraryAttributes & BundleAttributes & TestAttributes>;

/**
 * Input shape for tests and other in-process producers, where defaulted fields may be omitted
 */
export type RuleRecordInput = z.input<typeof ruleRecordSchema>;
