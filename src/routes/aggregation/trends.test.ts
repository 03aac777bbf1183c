import { describe, expect, it } from "vitest";

import { computeTrends } from "./trends";
import { DailySummaryRecord, DailyTable, MISSING, metricValue } from "../../types";

function day( locationId: string, date: string, mean: number | null ): DailySummaryRecord {
	return {
		locationId,
		date,
		sampleCount: 24,
		values: { temperature_2m_mean: mean === null ? MISSING : metricValue( mean ) },
		counts: { temperature_2m: mean === null ? 0 : 24 }
	};
}

const daily: DailyTable = {
	metrics: [ "temperature_2m" ],
	columns: [ { name: "temperature_2m_mean", metric: "temperature_2m", fn: "mean" } ],
	records: [
		day( "alpha", "2024-10-01", 10 ),
		day( "alpha", "2024-10-02", 12 ),
		day( "alpha", "2024-10-04", 20 ),
		day( "beta", "2024-10-01", null ),
		day( "beta", "2024-10-02", 5 )
	]
};

describe( "computeTrends", () => {
	it( "computes day-over-day deltas and a trailing mean per location", () => {
		const points = computeTrends( daily, "temperature_2m_mean", 2 );

		expect( points ).toEqual( [
			{ locationId: "alpha", date: "2024-10-01", value: metricValue( 10 ), delta: MISSING, rollingMean: metricValue( 10 ) },
			{ locationId: "alpha", date: "2024-10-02", value: metricValue( 12 ), delta: metricValue( 2 ), rollingMean: metricValue( 11 ) },
			{ locationId: "alpha", date: "2024-10-04", value: metricValue( 20 ), delta: MISSING, rollingMean: metricValue( 20 ) },
			{ locationId: "beta", date: "2024-10-01", value: MISSING, delta: MISSING, rollingMean: MISSING },
			{ locationId: "beta", date: "2024-10-02", value: metricValue( 5 ), delta: MISSING, rollingMean: metricValue( 5 ) }
		] );
	} );

	it( "rejects unknown columns and empty windows", () => {
		expect( () => computeTrends( daily, "temperature_2m_median", 7 ) ).toThrow( "Unknown daily column" );
		expect( () => computeTrends( daily, "temperature_2m_mean", 0 ) ).toThrow( "positive integer" );
	} );
} );
