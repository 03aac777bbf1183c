import { DateInterval, Location, SourceKind } from "../../types";
import { WeatherProvider } from "./WeatherProvider";
import { OpenMeteoNormalizer } from "../normalization/normalizers/OpenMeteoNormalizer";
import { HttpRequestOptions, httpJSONRequest } from "../weather";
import { isUtcZone, shiftDay } from "../time";

export const OPEN_METEO_ARCHIVE_URL = "https://archive-api.open-meteo.com/v1/archive";
export const OPEN_METEO_FORECAST_URL = "https://api.open-meteo.com/v1/forecast";

/** Hourly variables requested when no metric list is configured. */
export const DEFAULT_METRICS: readonly string[] = [
	"temperature_2m",
	"relative_humidity_2m",
	"dew_point_2m",
	"apparent_temperature",
	"precipitation",
	"rain",
	"snowfall",
	"cloudcover",
	"pressure_msl",
	"windspeed_10m",
	"winddirection_10m"
];

export interface OpenMeteoOptions {
	archiveUrl?: string;
	forecastUrl?: string;
	http?: HttpRequestOptions;
}

/**
 * Open-Meteo archive (reanalysis) and forecast API. Both answer with parallel hourly arrays in the
 * requested timezone and accept the same query parameters.
 */
export default class OpenMeteoWeatherProvider extends WeatherProvider {
	public readonly name = "OpenMeteo";
	public readonly sources: readonly SourceKind[] = [ "archive", "forecast" ];
	public readonly normalizer = new OpenMeteoNormalizer();

	private readonly archiveUrl: string;
	private readonly forecastUrl: string;
	private readonly http: HttpRequestOptions;

	public constructor( options: OpenMeteoOptions = {} ) {
		super();
		this.archiveUrl = options.archiveUrl ?? OPEN_METEO_ARCHIVE_URL;
		this.forecastUrl = options.forecastUrl ?? OPEN_METEO_FORECAST_URL;
		this.http = options.http ?? {};
	}

	/**
	 * The local dates to request so that the UTC interval is covered. Local days are shifted against UTC
	 * days by the zone offset, so anything but UTC gets one extra day on each side; the normalizer drops
	 * the surplus hours.
	 */
	public requestInterval( location: Location, interval: DateInterval ): DateInterval {
		if ( isUtcZone( location.timezone ) ) {
			return interval;
		}
		return { start: shiftDay( interval.start, -1 ), end: shiftDay( interval.end, 1 ) };
	}

	public async fetchHourly(
		source: SourceKind,
		location: Location,
		interval: DateInterval,
		metrics: readonly string[]
	): Promise<unknown> {
		const requested = this.requestInterval( location, interval );
		const url = source === "archive" ? this.archiveUrl : this.forecastUrl;

		console.log( `[OpenMeteo] ${ location.id }/${ source }: ${ requested.start } -> ${ requested.end } (${ location.timezone })` );

		return httpJSONRequest( url, {
			...this.http,
			params: {
				latitude: location.latitude,
				longitude: location.longitude,
				start_date: requested.start,
				end_date: requested.end,
				hourly: metrics.join( "," ),
				timezone: location.timezone
			}
		} );
	}
}
