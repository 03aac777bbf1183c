import { ObservationRecord, SourceKind, UnifiedHourlyTable } from "../../types";
import { NormalizedSequence } from "../normalization/types";
import { CodedError, ErrorCode } from "../../errors";

/**
 * Combines normalized per-location sequences into one hourly table.
 *
 * Precedence for a duplicate (location, hour):
 * - ARCHIVE beats FORECAST: observed data is authoritative over predicted data
 * - between two sequences of the same kind the one fetched last wins
 * - on an identical fetch time the sequence passed later wins
 *
 * Output rows are ordered by (locationId, timestamp) ascending. Downstream aggregation and the
 * dashboard rely on that order.
 */

export interface MergeStats {
	sequences: number;
	inputRecords: number;
	outputRecords: number;
	/** Records that lost against a higher ranked record for the same hour. */
	replaced: number;
	/** Surviving records per source kind. */
	bySource: Record<SourceKind, number>;
}

export interface MergeResult {
	table: UnifiedHourlyTable;
	stats: MergeStats;
}

const SOURCE_RANK: Readonly<Record<SourceKind, number>> = {
	forecast: 0,
	archive: 1
};

interface Candidate {
	record: ObservationRecord;
	source: SourceKind;
	fetchedAt: number;
	order: number;
}

/** Whether `challenger` takes precedence over `incumbent` for the same (location, hour). */
function outranks( challenger: Candidate, incumbent: Candidate ): boolean {
	if ( SOURCE_RANK[ challenger.source ] !== SOURCE_RANK[ incumbent.source ] ) {
		return SOURCE_RANK[ challenger.source ] > SOURCE_RANK[ incumbent.source ];
	}
	if ( challenger.fetchedAt !== incumbent.fetchedAt ) {
		return challenger.fetchedAt > incumbent.fetchedAt;
	}
	return challenger.order > incumbent.order;
}

function sameMetricSet( a: readonly string[], b: readonly string[] ): boolean {
	if ( a.length !== b.length ) {
		return false;
	}
	const set = new Set( a );
	return b.every( ( metric ) => set.has( metric ) );
}

function compareKeys( a: ObservationRecord, b: ObservationRecord ): number {
	if ( a.locationId !== b.locationId ) {
		return a.locationId < b.locationId ? -1 : 1;
	}
	return a.timestamp - b.timestamp;
}

/**
 * Fails with SchemaConflict when two sequences (of the same location or of different locations)
 * carry different metric sets. The table has exactly one schema.
 */
function resolveMetrics( sequences: readonly NormalizedSequence[] ): readonly string[] {
	const [ first, ...rest ] = sequences;
	if ( !first ) {
		return [];
	}

	const perLocation = new Map<string, NormalizedSequence>();
	for ( const sequence of sequences ) {
		const known = perLocation.get( sequence.locationId );
		if ( known && !sameMetricSet( known.metrics, sequence.metrics ) ) {
			throw new CodedError(
				ErrorCode.SchemaConflict,
				`[Merger] ${ sequence.locationId }: ${ known.source } delivers [${ known.metrics.join( ", " ) }] ` +
				`but ${ sequence.source } delivers [${ sequence.metrics.join( ", " ) }]`
			);
		}
		perLocation.set( sequence.locationId, known ?? sequence );
	}

	for ( const sequence of rest ) {
		if ( !sameMetricSet( first.metrics, sequence.metrics ) ) {
			throw new CodedError(
				ErrorCode.SchemaConflict,
				`[Merger] ${ sequence.locationId } delivers [${ sequence.metrics.join( ", " ) }] ` +
				`but ${ first.locationId } delivers [${ first.metrics.join( ", " ) }]`
			);
		}
	}

	return [ ...first.metrics ];
}

export function mergeSequences( sequences: readonly NormalizedSequence[] ): MergeResult {
	const metrics = resolveMetrics( sequences );
	const winners = new Map<string, Candidate>();
	let inputRecords = 0;
	let replaced = 0;

	sequences.forEach( ( sequence, order ) => {
		const fetchedAt = sequence.fetchedAt.getTime();
		for ( const record of sequence.records ) {
			inputRecords++;
			const key = `${ record.locationId }\u0000${ record.timestamp }`;
			const candidate: Candidate = { record, source: sequence.source, fetchedAt, order };
			const incumbent = winners.get( key );

			if ( !incumbent ) {
				winners.set( key, candidate );
				continue;
			}
			replaced++;
			if ( outranks( candidate, incumbent ) ) {
				winners.set( key, candidate );
			}
		}
	} );

	const bySource: Record<SourceKind, number> = { archive: 0, forecast: 0 };
	const survivors = Array.from( winners.values() );
	for ( const candidate of survivors ) {
		bySource[ candidate.source ]++;
	}

	const records = survivors.map( ( candidate ) => candidate.record ).sort( compareKeys );

	console.log(
		`[Merger] ${ sequences.length } sequences, ${ inputRecords } records -> ${ records.length } rows ` +
		`(${ replaced } replaced; archive ${ bySource.archive }, forecast ${ bySource.forecast })`
	);

	return {
		table: { metrics, records },
		stats: {
			sequences: sequences.length,
			inputRecords,
			outputRecords: records.length,
			replaced,
			bySource
		}
	};
}
