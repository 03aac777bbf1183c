export * from "./types";
export { CodedError, ErrorCode, makeCodedError } from "./errors";
export type { Settings, AwsSettings } from "./config";
export { loadEnvironment, loadSettings, loadLocations, parseLocations, parseInterval, slugify } from "./config";

export type { NormalizedSequence, NormalizationResult, NormalizerOptions, RawHourlyPayload } from "./routes/normalization/types";
export { BaseNormalizer } from "./routes/normalization/BaseNormalizer";
export { OpenMeteoNormalizer } from "./routes/normalization/normalizers/OpenMeteoNormalizer";
export { validateNormalizedSequence } from "./routes/normalization/NormalizedDataValidator";
export type { MergeResult, MergeStats } from "./routes/merging/MultiSourceMerger";
export { mergeSequences } from "./routes/merging/MultiSourceMerger";
export { aggregateDaily, applyAggregate, dailyColumns } from "./routes/aggregation/DailyAggregator";
export { DEFAULT_AGGREGATION_POLICY, parsePolicy, validatePolicy } from "./routes/aggregation/policy";
export type { TrendPoint } from "./routes/aggregation/trends";
export { computeTrends } from "./routes/aggregation/trends";

export type { ArtifactOptions } from "./routes/artifacts/ArtifactWriter";
export { artifactPath, locationsHash, writeArtifact, writeDailyArtifact, writeHourlyArtifact } from "./routes/artifacts/ArtifactWriter";
export { readDailyArtifact, readHourlyArtifact } from "./routes/artifacts/ArtifactReader";
export { dailyToCsv, hourlyToCsv, writeDailyCsv, writeHourlyCsv } from "./routes/artifacts/csv";
export type { Manifest } from "./routes/artifacts/manifest";
export { readManifest, writeManifest } from "./routes/artifacts/manifest";

export { WeatherProvider } from "./routes/weatherProviders/WeatherProvider";
export { default as OpenMeteoWeatherProvider, DEFAULT_METRICS } from "./routes/weatherProviders/OpenMeteo";
export { httpJSONRequest } from "./routes/weather";
export type { ObjectUploader, UploadOptions } from "./routes/archival/S3Archiver";
export { uploadArtifacts } from "./routes/archival/S3Archiver";

export type { PipelineOptions, PipelineResult } from "./pipeline";
export { runPipeline } from "./pipeline";
export { createApp, startServer } from "./server";
