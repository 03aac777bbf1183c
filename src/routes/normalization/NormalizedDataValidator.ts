import { find } from 'geo-tz';

import { DateInterval, Location, ValidationResult, isPresent } from '../../types';
import { NormalizedSequence } from './types';
import { HOUR_MS, intervalBounds, isHourAligned, isUtcZone } from '../time';

function log(message: string) {
    console.log(`[NormalizedDataValidator] ${message}`);
}

function warn(message: string) {
    console.warn(`[NormalizedDataValidator] ${message}`);
}

/** Plausible Wertebereiche je Metrik (kanonische Einheiten). */
const PLAUSIBLE_RANGES: Readonly<Record<string, readonly [number, number]>> = {
    temperature_2m: [-90, 60],
    dew_point_2m: [-90, 60],
    apparent_temperature: [-100, 70],
    relative_humidity_2m: [0, 100],
    precipitation: [0, 500],
    rain: [0, 500],
    snowfall: [0, 200],
    cloudcover: [0, 100],
    pressure_msl: [850, 1090],
    windspeed_10m: [0, 400],
    winddirection_10m: [0, 360],
};

export interface ValidationOptions {
    /** Warnung, wenn weniger als dieser Anteil der Intervall-Stunden vorhanden ist (0..1) */
    minCoverage?: number;
    /** Zeitzone gegen die Koordinaten prüfen */
    checkTimezone?: boolean;
}

/**
 * Validiere eine normalisierte Stundenreihe.
 *
 * Fehler: nicht stundengenaue oder doppelte Zeitstempel, falsche Reihenfolge,
 * Zeitstempel außerhalb des Intervalls.
 * Warnungen: unplausible Werte, geringe Abdeckung, abweichende Zeitzone.
 */
export function validateNormalizedSequence(
    sequence: NormalizedSequence,
    location: Location,
    interval: DateInterval,
    options: ValidationOptions = {}
): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];
    const { firstHour, lastHour, expectedHours } = intervalBounds(interval);
    const records = sequence.records;

    log(`Start validation: ${location.id}/${sequence.source}, ${records.length} Stunden`);

    // 1️⃣ Zeitstempel
    records.forEach((record, i) => {
        const iso = new Date(record.timestamp).toISOString();
        if (record.locationId !== location.id) {
            errors.push(`Stunde ${i}: falsche Location ${record.locationId}`);
        }
        if (!isHourAligned(record.timestamp)) {
            errors.push(`Stunde ${i}: Timestamp nicht stundengenau (${iso})`);
        }
        if (record.timestamp < firstHour || record.timestamp > lastHour) {
            errors.push(`Stunde ${i}: Timestamp außerhalb des Intervalls (${iso})`);
        }
        if (i > 0 && record.timestamp <= records[i - 1].timestamp) {
            errors.push(
                `Stunde ${i}: Nicht streng aufsteigend ` +
                `(${record.timestamp} <= ${records[i - 1].timestamp})`
            );
        }
    });

    // 2️⃣ Schema & Wertebereiche
    for (const record of records) {
        for (const metric of sequence.metrics) {
            const value = record.metrics[metric];
            if (value === undefined) {
                errors.push(`Metrik ${metric} fehlt für ${new Date(record.timestamp).toISOString()}`);
                continue;
            }
            const range = PLAUSIBLE_RANGES[metric];
            if (range && isPresent(value) && (value.value < range[0] || value.value > range[1])) {
                warnings.push(
                    `${metric} außerhalb Bereich um ${new Date(record.timestamp).toISOString()}: ${value.value}`
                );
            }
        }
    }

    // 3️⃣ Abdeckung
    const minCoverage = options.minCoverage ?? 0.9;
    if (records.length < expectedHours * minCoverage) {
        warnings.push(`Nur ${records.length} von ${expectedHours} Stunden vorhanden`);
    }

    // 4️⃣ Große Lücken
    for (let i = 1; i < records.length; i++) {
        const gapHours = (records[i].timestamp - records[i - 1].timestamp) / HOUR_MS;
        if (gapHours > 6) {
            warnings.push(
                `Große Lücke nach ${new Date(records[i - 1].timestamp).toISOString()}: ${gapHours} Stunden`
            );
        }
    }

    // 5️⃣ Zeitzone vs. Koordinaten
    if (options.checkTimezone ?? true) {
        const candidates = find(location.latitude, location.longitude);
        const matches = candidates.includes(location.timezone) || (isUtcZone(location.timezone) && candidates.length === 0);
        if (!matches) {
            warnings.push(
                `Deklarierte Zeitzone ${location.timezone} passt nicht zu den Koordinaten (${candidates.join(', ') || 'keine'})`
            );
        }
    }

    if (errors.length > 0) {
        log(`Validation FAILED with ${errors.length} error(s)`);
    } else {
        log(`Validation OK`);
    }

    warnings.forEach(w => warn(w));

    return {
        valid: errors.length === 0,
        errors,
        warnings
    };
}
