export { CourseArchiver } from './domain/archive/CourseArchiver';
export type { ArchiveSummary, CourseArchiverDeps } from './domain/archive/CourseArchiver';
export { AssetMaterializer, localFilenameFor } from './domain/assets/AssetMaterializer';
export { CssDependencyResolver } from './domain/assets/CssDependencyResolver';
export { HtmlAssetLocalizer } from './domain/assets/HtmlAssetLocalizer';
export { ScriptDeferrer } from './domain/assets/ScriptDeferrer';
export { OptimizationCache } from './domain/cache/OptimizationCache';
export type { OptimizationCacheStore } from './domain/cache/OptimizationCache';
export { ContentLinkResolver } from './domain/content/ContentLinkResolver';
export { ContentTreeBuilder } from './domain/content/ContentTreeBuilder';
export { ContentTree, ContentUnit } from './domain/content/ContentUnit';
export { CourseTabRegistry } from './domain/content/CourseTabRegistry';
export { createHandlerTable } from './domain/content/handlers';
export * from './domain/models/errors';
export * from './domain/models/types';
export * from './domain/paths/PathAlgebra';
export { RelativePathContext } from './domain/paths/RelativePathContext';
export * from './domain/urls/UrlResolver';
export * from './models/ArchiveTypes';
export { AxiosHttpClient } from './services/HttpClient';
export type { HttpClient } from './services/HttpClient';
export { LocalObjectStore } from './services/LocalObjectStore';
export { createLogger, LoggingService } from './services/LoggingService';
export { PlatformSession } from './services/PlatformSession';
export type { PageSource } from './services/PlatformSession';
export { TemplateRenderer } from './services/TemplateRenderer';
export { loadArchiverConfig } from './utils/ConfigLoader';
