import { BaseNormalizer } from '../BaseNormalizer';
import { DateInterval, Location, MetricValue, ObservationRecord, RangeGap } from '../../../types';
import { NormalizationResult, NormalizerOptions } from '../types';
import { converterFor } from '../converters';
import { isHourAligned, intervalBounds, isUtcZone, toUtcTimestamp } from '../../time';
import { parseHourlyPayload } from '../../weatherProviders/ProviderDataValidator';
import { CodedError, ErrorCode } from '../../../errors';

/**
 * Normalisierer für OpenMeteo Wetterdienst (Archive- und Forecast-API).
 *
 * OpenMeteo Eigenschaften:
 * - Liefert Stundenwerte als parallele Arrays, über den Index an `hourly.time` gebunden
 * - Zeitstempel sind lokale Wanduhrzeit in der angefragten Zeitzone, oder Unix-Sekunden
 * - Fehlende Werte kommen als `null`
 * - Einheiten stehen in `hourly_units` und können API-seitig auf Imperial gesetzt werden
 */
export class OpenMeteoNormalizer extends BaseNormalizer<unknown> {
    readonly providerName = 'OpenMeteo';

    normalize(
        payload: unknown,
        location: Location,
        interval: DateInterval,
        options: NormalizerOptions
    ): NormalizationResult {
        const raw = parseHourlyPayload(payload, `${location.id}/${options.source}`);
        const delivered = Object.keys(raw.series);
        this.assertMetricSet(delivered, options.expectedMetrics, location);

        for (const metric of options.expectedMetrics) {
            const length = raw.series[metric].length;
            if (length !== raw.time.length) {
                throw new CodedError(
                    ErrorCode.SchemaMismatch,
                    `[${this.providerName} Normalizer] ${location.id}: '${metric}' has ${length} values for ${raw.time.length} timestamps`
                );
            }
        }

        // Die Zeitzone der Antwort ist deklariert, nicht geraten. Ohne Angabe gilt die der Location.
        const timezone = raw.timezone ?? location.timezone;
        if (raw.timezone !== undefined && !this.sameZone(raw.timezone, location.timezone)) {
            this.warn(`${location.id}: Antwort in Zeitzone ${raw.timezone}, Location deklariert ${location.timezone}`);
        }

        const converters = options.expectedMetrics.map(metric => {
            const unit = raw.units[metric];
            const converter = converterFor(metric, unit);
            if (!converter) {
                this.warn(`${location.id}: unbekannte Einheit '${unit}' für ${metric}, Werte bleiben unverändert`);
                return (value: number) => value;
            }
            return converter;
        });

        this.log(`Normalisiere ${raw.time.length} Stunden für ${location.id} (${options.source})`);

        const { firstHour, lastHour } = intervalBounds(interval);
        let outsideInterval = 0;
        let misaligned = 0;
        const normalized: ObservationRecord[] = [];
        const seenWallClock = new Set<string>();

        // Der deklarierte Offset gilt für die ganze Antwort; die Zonenregeln nur, wenn er fehlt.
        raw.time.forEach((rawTime, index) => {
            const repeated = typeof rawTime === 'string' && seenWallClock.has(rawTime);
            if (typeof rawTime === 'string') {
                seenWallClock.add(rawTime);
            }
            const timestamp = toUtcTimestamp(rawTime, timezone, {
                utcOffsetSeconds: raw.utcOffsetSeconds,
                repeated,
            });
            if (timestamp === undefined || !isHourAligned(timestamp)) {
                misaligned++;
                return;
            }
            if (timestamp < firstHour || timestamp > lastHour) {
                outsideInterval++;
                return;
            }

            const metrics: Record<string, MetricValue> = {};
            options.expectedMetrics.forEach((metric, metricIndex) => {
                metrics[metric] = this.readMetricValue(
                    raw.series[metric][index],
                    options.sentinels,
                    converters[metricIndex]
                );
            });

            normalized.push({ locationId: location.id, timestamp, metrics });
        });

        if (misaligned > 0) {
            this.warn(`${location.id}: ${misaligned} Zeitstempel nicht lesbar oder nicht stundengenau, verworfen`);
        }

        const sorted = this.sortChronological(normalized);
        const deduplicated = this.removeDuplicates(sorted);
        const gap = this.detectGap(deduplicated, location, options.source, interval);
        const gaps: RangeGap[] = gap ? [gap] : [];

        this.log(
            `Normalisiert zu ${deduplicated.length} Stunden (chronologisch), ${outsideInterval} außerhalb des Intervalls`
        );

        return {
            sequence: {
                locationId: location.id,
                provider: this.providerName,
                source: options.source,
                fetchedAt: options.fetchedAt,
                metrics: [...options.expectedMetrics],
                records: deduplicated,
            },
            gaps,
            metadata: {
                provider: this.providerName,
                timezone,
                utcOffsetSeconds: raw.utcOffsetSeconds,
                coordinates: [location.latitude, location.longitude],
                rawRows: raw.time.length,
                outsideInterval,
                misaligned,
                duplicates: sorted.length - deduplicated.length,
                oldest: deduplicated.length > 0 ? new Date(deduplicated[0].timestamp) : undefined,
                newest: deduplicated.length > 0 ? new Date(deduplicated[deduplicated.length - 1].timestamp) : undefined,
            },
        };
    }

    private sameZone(a: string, b: string): boolean {
        return a === b || (isUtcZone(a) && isUtcZone(b));
    }
}
