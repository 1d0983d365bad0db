// App
export { App, createApp } from "./app/app.js";
export { AppOptionsSchema } from "./app/options.js";
export type { AppOptions, ResolvedAppOptions } from "./app/options.js";

// Schema
export { field, FieldDef } from "./schema/field.js";
export type { FieldOptions } from "./schema/field.js";
export { record, RecordSchema } from "./schema/record.js";
export type { RecordShape, RecordValue, FieldValue } from "./schema/record.js";
export { isParamSpec, isRecordParam, matchesParams } from "./schema/params.js";
export type { Handler, ParamSpec, ParamValue, ParamValues } from "./schema/params.js";
export { extractFields, longNameOf } from "./schema/metadata.js";
export type { FieldRef, FieldTable } from "./schema/metadata.js";

// Coercion
export { coerce, coerceTo, typeLabel } from "./coercion/coerce.js";

// Binding
export { bindRecord } from "./binding/record-binder.js";
export type { BoundRecord, RecordFields } from "./binding/record-binder.js";
export { bindArguments } from "./binding/invocation.js";
export type { BoundValue } from "./binding/invocation.js";

// Registry
export { defineCommand, splitPath } from "./registry/command.js";
export type { CommandEntry } from "./registry/command.js";
export { createCommandRegistry } from "./registry/command-registry.js";
export type { CommandRegistry, Resolution } from "./registry/command-registry.js";

// Help
export { renderCommandHelp, renderGlobalHelp } from "./help/help-renderer.js";
