import { DateInterval, Location, SourceKind } from "../../types";
import { BaseNormalizer } from "../normalization/BaseNormalizer";

export abstract class WeatherProvider {
	/** Name used in log messages and on normalized sequences. */
	public abstract readonly name: string;

	/** The sources this provider can deliver, in the order they are fetched. */
	public abstract readonly sources: readonly SourceKind[];

	/** Turns this provider's raw payloads into normalized hourly sequences. */
	public abstract readonly normalizer: BaseNormalizer;

	/**
	 * Retrieves the raw hourly payload of one source for a location.
	 * @param location The location to fetch. Its timezone is the one local timestamps will be reported in.
	 * @param interval The closed UTC date interval that must be covered.
	 * @param metrics The metrics to request, in output order.
	 * @return A Promise that will be resolved with the raw, unvalidated payload.
	 * @throws CodedError with UpstreamFailure if the provider cannot be reached or answers with an error.
	 */
	public abstract fetchHourly(
		source: SourceKind,
		location: Location,
		interval: DateInterval,
		metrics: readonly string[]
	): Promise<unknown>;
}
