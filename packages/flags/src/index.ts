export { FileContentLoader } from "./adapters/loaders/file-content-loader"
export {
  StorageContentLoader,
  type StorageContentLoaderDeps,
  type StorageContentLoaderOptions,
} from "./adapters/loaders/storage-content-loader"
export {
  type ConfigurationPayload,
  configurationPayloadSchema,
  JsonConfigurationParser,
} from "./adapters/parsers/json-configuration-parser"
export { StaticContextProvider } from "./adapters/providers/static-context-provider"
export {
  FixedRateScheduler,
  type FixedRateSchedulerDeps,
} from "./adapters/scheduler/fixed-rate-scheduler"
export {
  type AccessorName,
  type ConfigurationDescriptor,
  ConfigurationNamespace,
  defineConfigurationNamespace,
  NamespaceDefinition,
  type NamespaceSpec,
} from "./core/accessors/configuration-namespace"
export { ContextAggregator, type ContextResult } from "./core/context/context-aggregator"
export { ContextProviderRegistry } from "./core/context/context-provider-registry"
export {
  ConfigurationError,
  ConfigurationParseError,
  type ConfigurationParseErrorCode,
  ContentLoadError,
  type ContentLoadErrorCode,
  DuplicateContextParameterError,
  type PayloadIssue,
  RepositoryError,
  type RepositoryErrorCode,
} from "./core/errors"
export { ConditionsProcessor } from "./core/evaluation/conditions-processor"
export { createConfiguration, deepFreeze } from "./core/model/configuration"
export { findDuplicateAliases, Snapshot, type SnapshotMetadata } from "./core/model/snapshot"
export { describeValue, inferValueType, isValueOfType } from "./core/model/value-types"
export {
  DEFAULT_REFRESH_INTERVAL_MS,
  RemoteConfigurationRepository,
  type RemoteConfigurationRepositoryDeps,
  type RemoteConfigurationRepositoryOptions,
} from "./core/repository/remote-configuration-repository"
export {
  ConfigurationResolver,
  type ConfigurationResolverDeps,
  type ResolveResult,
} from "./core/resolution/configuration-resolver"
export type {
  Condition,
  ConditionMatch,
  Configuration,
  ConfigurationAlias,
  ConfigurationInput,
} from "./ports/configuration"
export type { ConfigurationParser } from "./ports/configuration-parser"
export type {
  ConfigurationLookup,
  ConfigurationRepository,
  ConfigurationSnapshot,
  RefreshOutcome,
  RepositoryState,
  RepositoryStatus,
} from "./ports/configuration-repository"
export type { ContentLoader } from "./ports/content-loader"
export type { Context, ContextProvider } from "./ports/context"
export type { ScheduledTask, ScheduledTaskFn, TaskScheduler } from "./ports/task-scheduler"
export {
  type ConfigurationValue,
  type ValueOf,
  type ValueType,
  type ValueTypeMap,
  valueTypes,
} from "./ports/value-type"
