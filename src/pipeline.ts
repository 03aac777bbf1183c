import path from "node:path";

import {
	AggregationPolicy,
	ArtifactDescriptor,
	DateInterval,
	Location,
	RangeGap,
	SourceKind
} from "./types";
import { CodedError, ErrorCode, makeCodedError } from "./errors";
import { WeatherProvider } from "./routes/weatherProviders/WeatherProvider";
import { NormalizationResult, NormalizedSequence } from "./routes/normalization/types";
import { validateNormalizedSequence } from "./routes/normalization/NormalizedDataValidator";
import { MergeStats, mergeSequences } from "./routes/merging/MultiSourceMerger";
import { aggregateDaily } from "./routes/aggregation/DailyAggregator";
import { DEFAULT_AGGREGATION_POLICY } from "./routes/aggregation/policy";
import { ArtifactOptions, writeDailyArtifact, writeHourlyArtifact } from "./routes/artifacts/ArtifactWriter";
import { writeDailyCsv, writeHourlyCsv } from "./routes/artifacts/csv";
import { writeManifest } from "./routes/artifacts/manifest";
import { writeTextAtomically } from "./routes/artifacts/atomic";
import { UploadOptions, uploadArtifacts } from "./routes/archival/S3Archiver";
import { intervalBounds } from "./routes/time";

export interface PipelineOptions {
	locations: readonly Location[];
	interval: DateInterval;
	provider: WeatherProvider;
	/** Raw payloads go to `<dataDir>/raw`, artifacts to `<dataDir>/processed`. */
	dataDir: string;
	metrics: readonly string[];
	sentinels: readonly number[];
	policy?: AggregationPolicy;
	/** Locations fetched and normalized at the same time. Defaults to 4. */
	concurrency?: number;
	/** Set when `locations` is a subset of the registry. Adds the location hash to artifact paths. */
	restricted?: boolean;
	writeCsv?: boolean;
	/** Uploads the artifacts and the manifest when given. */
	upload?: UploadOptions;
	now?: () => Date;
}

export interface SkippedLocation {
	locationId: string;
	reason: string;
}

export interface PipelineResult {
	artifacts: ArtifactDescriptor[];
	manifestPath: string;
	gaps: RangeGap[];
	skipped: SkippedLocation[];
	merge: MergeStats;
	/** Raw rows the normalizers discarded (outside the interval, misaligned or duplicate). */
	droppedRows: number;
	uploaded: string[];
}

interface LocationOutcome {
	location: Location;
	sequences: NormalizedSequence[];
	gaps: RangeGap[];
	failures: string[];
	/** Raw rows the normalizer discarded. */
	dropped: number;
}

/**
 * Runs `task` for every item with at most `limit` tasks in flight. Stops handing out items after the
 * first failure and rejects with it once the running tasks have settled. Results keep the input order.
 */
export async function mapWithConcurrency<T, R>(
	items: readonly T[],
	limit: number,
	task: ( item: T ) => Promise<R>
): Promise<R[]> {
	const results = new Array<R>( items.length );
	let next = 0;
	const state: { failure?: { error: unknown } } = {};

	async function worker(): Promise<void> {
		while ( next < items.length && !state.failure ) {
			const index = next++;
			try {
				results[ index ] = await task( items[ index ] );
			} catch ( err ) {
				state.failure = state.failure ?? { error: err };
			}
		}
	}

	const workers = Math.max( 1, Math.min( limit, items.length ) );
	await Promise.all( Array.from( { length: workers }, () => worker() ) );
	if ( state.failure ) {
		throw state.failure.error;
	}
	return results;
}

export function rawPayloadPath( dataDir: string, locationId: string, source: SourceKind, interval: DateInterval ): string {
	return path.join( dataDir, "raw", `${ locationId }__${ source }__${ interval.start }__${ interval.end }.json` );
}

async function acquireLocation( location: Location, options: PipelineOptions, now: () => Date ): Promise<LocationOutcome> {
	const outcome: LocationOutcome = { location, sequences: [], gaps: [], failures: [], dropped: 0 };

	for ( const source of options.provider.sources ) {
		const fetchedAt = now();
		let result: NormalizationResult;
		try {
			const payload = await options.provider.fetchHourly( source, location, options.interval, options.metrics );
			await writeTextAtomically(
				rawPayloadPath( options.dataDir, location.id, source, options.interval ),
				JSON.stringify( payload )
			);
			result = options.provider.normalizer.normalize( payload, location, options.interval, {
				expectedMetrics: options.metrics,
				sentinels: options.sentinels,
				source,
				fetchedAt
			} );
		} catch ( err ) {
			const error = makeCodedError( err );
			if ( error.errCode !== ErrorCode.UpstreamFailure ) {
				throw error;
			}
			console.warn( `[Pipeline] ${ location.id }/${ source }: ${ error.message }` );
			outcome.failures.push( `${ source }: ${ error.message }` );
			continue;
		}

		const { metadata } = result;
		console.log(
			`[Pipeline] ${ location.id }/${ source }: ${ result.sequence.records.length } of ${ metadata.rawRows } rows kept ` +
			`(${ metadata.outsideInterval } outside interval, ${ metadata.misaligned } misaligned, ${ metadata.duplicates } duplicates)`
		);
		outcome.dropped += metadata.outsideInterval + metadata.misaligned + metadata.duplicates;

		const validation = validateNormalizedSequence( result.sequence, location, options.interval );
		if ( !validation.valid ) {
			throw new CodedError(
				ErrorCode.SchemaMismatch,
				`[Pipeline] ${ location.id }/${ source }: normalized sequence is invalid (${ validation.errors.slice( 0, 3 ).join( "; " ) })`
			);
		}

		outcome.sequences.push( result.sequence );
		outcome.gaps.push( ...result.gaps );
	}

	return outcome;
}

/**
 * Fetches, normalizes, merges and aggregates the weather of all locations and writes the hourly and
 * daily artifacts plus a manifest.
 *
 * A location whose sources all fail upstream is skipped. Any other error aborts the run; artifacts
 * already at their canonical paths are then left as they were.
 */
export async function runPipeline( options: PipelineOptions ): Promise<PipelineResult> {
	intervalBounds( options.interval );
	const now = options.now ?? ( () => new Date() );
	const processedDir = path.join( options.dataDir, "processed" );

	console.log(
		`[Pipeline] ${ options.locations.length } locations, ${ options.interval.start } -> ${ options.interval.end }, ` +
		`provider ${ options.provider.name }`
	);

	const outcomes = await mapWithConcurrency(
		options.locations,
		options.concurrency ?? 4,
		( location ) => acquireLocation( location, options, now )
	);

	const skipped: SkippedLocation[] = outcomes
		.filter( ( outcome ) => outcome.sequences.length === 0 )
		.map( ( outcome ) => ( { locationId: outcome.location.id, reason: outcome.failures.join( "; " ) || "no data" } ) );
	for ( const skip of skipped ) {
		console.warn( `[Pipeline] Skipping ${ skip.locationId }: ${ skip.reason }` );
	}

	const sequences = outcomes.flatMap( ( outcome ) => outcome.sequences );
	const gaps = outcomes.flatMap( ( outcome ) => outcome.gaps );
	const droppedRows = outcomes.reduce( ( sum, outcome ) => sum + outcome.dropped, 0 );
	const { table, stats } = mergeSequences( sequences );
	if ( table.records.length === 0 ) {
		throw new CodedError( ErrorCode.InsufficientWeatherData, "[Pipeline] No location produced any data" );
	}

	const artifactOptions = ( name: string ): ArtifactOptions => ( {
		outputDir: processedDir,
		name,
		interval: options.interval,
		locations: options.restricted ? options.locations.map( ( location ) => location.id ) : undefined
	} );

	const daily = aggregateDaily( table, options.policy ?? DEFAULT_AGGREGATION_POLICY );

	const artifacts: ArtifactDescriptor[] = [
		await writeHourlyArtifact( table, artifactOptions( "hourly" ) ),
		await writeDailyArtifact( daily, artifactOptions( "daily" ) )
	];
	if ( options.writeCsv ) {
		artifacts.push(
			await writeHourlyCsv( table, artifactOptions( "hourly" ) ),
			await writeDailyCsv( daily, artifactOptions( "daily" ) )
		);
	}

	const manifestPath = await writeManifest( processedDir, options.interval, artifacts );

	const uploaded = options.upload
		? await uploadArtifacts( [ ...artifacts.map( ( artifact ) => artifact.path ), manifestPath ], options.upload )
		: [];

	console.log(
		`[Pipeline] Done: ${ table.records.length } hourly rows, ${ daily.records.length } daily rows, ` +
		`${ gaps.length } gaps, ${ droppedRows } raw rows dropped, ${ skipped.length } skipped`
	);

	return { artifacts, manifestPath, gaps, skipped, merge: stats, droppedRows, uploaded };
}
