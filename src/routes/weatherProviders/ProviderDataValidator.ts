import { z } from 'zod';

import { RawHourlyPayload } from '../normalization/types';
import { CodedError, ErrorCode } from '../../errors';

const providerErrorSchema = z.object({
    error: z.literal(true),
    reason: z.string().optional(),
});

const hourlySchema = z
    .object({
        time: z.array(z.union([z.string(), z.number()])),
    })
    .catchall(z.array(z.unknown()));

const payloadSchema = z.object({
    timezone: z.string().optional(),
    utc_offset_seconds: z.number().optional(),
    hourly_units: z.record(z.string()).optional(),
    hourly: hourlySchema,
});

function describeIssues(error: z.ZodError): string {
    return error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
}

/**
 * Validiere die Struktur einer Provider-Antwort und überführe sie in RawHourlyPayload.
 *
 * @param raw - deserialisierte Antwort des Providers
 * @param context - Bezeichnung für Fehlermeldungen (z. B. "berlin/archive")
 */
export function parseHourlyPayload(raw: unknown, context: string): RawHourlyPayload {
    const providerError = providerErrorSchema.safeParse(raw);
    if (providerError.success) {
        throw new CodedError(
            ErrorCode.UpstreamFailure,
            `[ProviderDataValidator] ${context}: provider reported an error: ${providerError.data.reason ?? 'no reason given'}`
        );
    }

    const parsed = payloadSchema.safeParse(raw);
    if (!parsed.success) {
        throw new CodedError(
            ErrorCode.SchemaMismatch,
            `[ProviderDataValidator] ${context}: unexpected payload shape (${describeIssues(parsed.error)})`
        );
    }

    const { time, ...series } = parsed.data.hourly;
    const { time: _timeUnit, ...units } = parsed.data.hourly_units ?? {};

    return {
        timezone: parsed.data.timezone,
        utcOffsetSeconds: parsed.data.utc_offset_seconds,
        units,
        time,
        series,
    };
}
