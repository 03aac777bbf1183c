import {
    DateInterval,
    Location,
    MetricValue,
    MISSING,
    ObservationRecord,
    RangeGap,
    SourceKind,
    metricValue,
} from '../../types';
import { NormalizationResult, NormalizerOptions } from './types';
import { CodedError, ErrorCode } from '../../errors';
import { hourlyTimestamps } from '../time';

/**
 * Abstrakte Basis-Klasse für Wetterdaten-Normalisierer.
 * Jeder Provider implementiert einen konkreten Normalizer der diese Klasse erweitert.
 */
export abstract class BaseNormalizer<TPayload = unknown> {
    /**
     * Provider Name (z.B. "OpenMeteo")
     */
    abstract readonly providerName: string;

    /**
     * Normalisiere die Rohdaten einer Location zu einer stündlichen UTC-Reihe.
     *
     * @param payload - Rohdaten vom Provider
     * @param location - Location mit deklarierter Zeitzone
     * @param interval - angefragtes Datumsintervall (UTC, geschlossen)
     */
    abstract normalize(
        payload: TPayload,
        location: Location,
        interval: DateInterval,
        options: NormalizerOptions
    ): NormalizationResult;

    /**
     * Prüfe, dass der Provider genau die erwarteten Metriken geliefert hat.
     */
    protected assertMetricSet(
        delivered: readonly string[],
        expected: readonly string[],
        location: Location
    ): void {
        const deliveredSet = new Set(delivered);
        const expectedSet = new Set(expected);
        const missing = expected.filter(metric => !deliveredSet.has(metric));
        const unexpected = delivered.filter(metric => !expectedSet.has(metric));

        if (missing.length > 0 || unexpected.length > 0) {
            throw new CodedError(
                ErrorCode.SchemaMismatch,
                `[${this.providerName} Normalizer] ${location.id}: metric set does not match ` +
                `(missing: ${missing.join(', ') || '-'}; unexpected: ${unexpected.join(', ') || '-'})`
            );
        }
    }

    /**
     * Übersetze einen Rohwert in einen MetricValue. Null, nicht-numerische Werte und
     * Sentinel-Marker werden zu MISSING, niemals zu 0.
     */
    protected readMetricValue(
        raw: unknown,
        sentinels: readonly number[],
        convert: (value: number) => number
    ): MetricValue {
        if (typeof raw !== 'number' || !Number.isFinite(raw)) {
            return MISSING;
        }
        if (sentinels.includes(raw)) {
            return MISSING;
        }
        return metricValue(convert(raw));
    }

    /**
     * Sortiere Daten chronologisch (älteste zuerst).
     */
    protected sortChronological(
        data: ObservationRecord[]
    ): ObservationRecord[] {
        return [...data].sort((a, b) => a.timestamp - b.timestamp);
    }

    /**
     * Entferne doppelte Timestamps. Der erste Datensatz bleibt erhalten.
     */
    protected removeDuplicates(
        data: ObservationRecord[]
    ): ObservationRecord[] {
        const seen = new Set<number>();
        return data.filter(item => {
            if (seen.has(item.timestamp)) {
                this.warn(`Doppelter Timestamp: ${new Date(item.timestamp).toISOString()}`);
                return false;
            }
            seen.add(item.timestamp);
            return true;
        });
    }

    /**
     * Ermittle fehlende Stunden im Intervall. Es werden keine Zeilen erfunden,
     * die Lücke wird nur festgehalten und geloggt.
     */
    protected detectGap(
        records: readonly ObservationRecord[],
        location: Location,
        source: SourceKind,
        interval: DateInterval
    ): RangeGap | undefined {
        const expected = hourlyTimestamps(interval);
        const present = new Set(records.map(record => record.timestamp));
        const missingTimestamps = expected.filter(timestamp => !present.has(timestamp));

        if (missingTimestamps.length === 0) {
            return undefined;
        }

        const gap: RangeGap = {
            locationId: location.id,
            source,
            expectedHours: expected.length,
            receivedHours: expected.length - missingTimestamps.length,
            missingTimestamps,
        };

        const incomplete = new CodedError(
            ErrorCode.IncompleteRange,
            `${location.id}/${source}: ${gap.receivedHours} of ${gap.expectedHours} hours ` +
            `(first missing: ${new Date(missingTimestamps[0]).toISOString()})`
        );
        this.warn(`${incomplete.name}[${ErrorCode[incomplete.errCode]}] ${incomplete.message}`);

        return gap;
    }

    /**
     * Logge Normalisierungs-Info.
     */
    protected log(message: string): void {
        console.log(`[${this.providerName} Normalizer] ${message}`);
    }

    /**
     * Logge Warnung.
     */
    protected warn(message: string): void {
        console.warn(`[${this.providerName} Normalizer] ${message}`);
    }
}
