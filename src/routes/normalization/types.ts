import { GeoCoordinates, ObservationRecord, RangeGap, SourceKind } from '../../types';

/**
 * Provider-Rohdaten einer Stunde-für-Stunde Abfrage, bereits auf Struktur geprüft
 * (siehe ProviderDataValidator). Alle Arrays sind über den Index an `time` gebunden.
 */
export interface RawHourlyPayload {
    /** Zeitzone, in der der Provider die Zeitstempel ausliefert (z. B. "Europe/Berlin" oder "GMT") */
    timezone?: string;

    /** UTC-Offset in Sekunden, den der Provider zum Abfragezeitpunkt gemeldet hat */
    utcOffsetSeconds?: number;

    /** Einheit je Metrik (z. B. { temperature_2m: "°C" }) */
    units: Readonly<Record<string, string>>;

    /** Zeitstempel: lokale Wanduhrzeit, ISO mit Offset oder Unix-Sekunden */
    time: readonly (string | number)[];

    /** Eine Werte-Reihe pro Metrik */
    series: Readonly<Record<string, readonly unknown[]>>;
}

/**
 * Optionen, die dem Normalizer explizit übergeben werden.
 */
export interface NormalizerOptions {
    /** Erwartete Metriken in Ausgabereihenfolge */
    expectedMetrics: readonly string[];

    /** Provider-spezifische "keine Daten"-Marker (z. B. -9999) */
    sentinels: readonly number[];

    /** Herkunft der Daten */
    source: SourceKind;

    /** Abrufzeitpunkt, entscheidet bei gleicher Herkunft über den Vorrang */
    fetchedAt: Date;
}

/**
 * Normalisierte, aufsteigend sortierte Stundenreihe einer Location aus einer Quelle.
 */
export interface NormalizedSequence {
    locationId: string;

    /** Ursprünglicher Wetterdienst */
    provider: string;

    source: SourceKind;

    fetchedAt: Date;

    /** Metriken in Ausgabereihenfolge */
    metrics: readonly string[];

    records: readonly ObservationRecord[];
}

/**
 * Metadaten zur Nachvollziehbarkeit der Normalisierung.
 */
export interface NormalizationMetadata {
    /** Provider-Name (z. B. "OpenMeteo") */
    provider: string;

    /** IANA-Zeitzone, mit der lokale Zeitstempel umgerechnet wurden */
    timezone: string;

    /** Deklarierter UTC-Offset der Antwort in Sekunden, falls vorhanden */
    utcOffsetSeconds?: number;

    /** Geographische Koordinaten */
    coordinates: GeoCoordinates;

    /** Anzahl Rohzeilen */
    rawRows: number;

    /** Verworfene Zeilen außerhalb des Intervalls */
    outsideInterval: number;

    /** Verworfene Zeilen ohne lesbaren oder stundengenauen Zeitstempel */
    misaligned: number;

    /** Verworfene doppelte Zeitstempel */
    duplicates: number;

    /** Ältester enthaltener Zeitstempel */
    oldest?: Date;

    /** Neuester enthaltener Zeitstempel */
    newest?: Date;
}

/**
 * Ergebnis einer Normalisierung. Lücken sind kein Abbruchgrund, sie werden nur festgehalten.
 */
export interface NormalizationResult {
    sequence: NormalizedSequence;
    gaps: RangeGap[];
    metadata: NormalizationMetadata;
}
