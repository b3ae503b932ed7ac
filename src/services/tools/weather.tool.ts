import type { ToolInvokeContext, ToolInvoker } from "../../types/tool";
import { asNumber, asObject, asString } from "../../utils/values";
import { ToolFault } from "./tool.fault";
import { fetchToolJson, type FetchLike } from "./tool.http";

export const WEATHER_UNITS = ["metric", "imperial", "standard"] as const;
export type WeatherUnits = (typeof WEATHER_UNITS)[number];

export interface WeatherReport {
  city: string;
  country: string;
  temperature: number | null;
  temperature_unit: string;
  feels_like: number | null;
  conditions: string;
  humidity: number | null;
  wind_speed: number | null;
  wind_speed_unit: string;
  pressure: number | null;
  cloudiness: number | null;
  timestamp: number | null;
  units: WeatherUnits;
}

export interface OpenWeatherToolOptions {
  apiBase: string;
  apiKey: string;
  timeoutMs: number;
  fetchImpl?: FetchLike;
}

export function parseUnits(value: unknown): WeatherUnits {
  const units = asString(value).toLowerCase();
  return WEATHER_UNITS.find((candidate) => candidate === units) ?? "metric";
}

function capitalize(value: string): string {
  return value ? value.charAt(0).toUpperCase() + value.slice(1) : value;
}

export function toWeatherReport(raw: Record<string, unknown>, units: WeatherUnits): WeatherReport {
  const main = asObject(raw.main) ?? {};
  const wind = asObject(raw.wind) ?? {};
  const sys = asObject(raw.sys) ?? {};
  const clouds = asObject(raw.clouds) ?? {};
  const conditions = Array.isArray(raw.weather) ? asObject(raw.weather[0]) ?? {} : {};

  const temperatureUnit = units === "metric" ? "°C" : units === "imperial" ? "°F" : "K";

  return {
    city: asString(raw.name) || "Unknown",
    country: asString(sys.country) || "Unknown",
    temperature: asNumber(main.temp),
    temperature_unit: temperatureUnit,
    feels_like: asNumber(main.feels_like),
    conditions: capitalize(asString(conditions.description)),
    humidity: asNumber(main.humidity),
    wind_speed: asNumber(wind.speed),
    wind_speed_unit: units === "imperial" ? "mph" : "m/s",
    pressure: asNumber(main.pressure),
    cloudiness: asNumber(clouds.all),
    timestamp: asNumber(raw.dt),
    units,
  };
}

export class OpenWeatherTool implements ToolInvoker {
  constructor(private readonly options: OpenWeatherToolOptions) {}

  async invoke(parameters: Record<string, unknown>, context: ToolInvokeContext = {}): Promise<unknown> {
    const city = asString(parameters.city);
    if (!city) {
      throw new ToolFault("INVALID_PARAMETERS", "weather requires a non-empty city");
    }

    if (!this.options.apiKey) {
      throw new ToolFault("UNAUTHORIZED", "OPENWEATHER_API_KEY is not configured");
    }

    const units = parseUnits(parameters.units);
    const body = asObject(await fetchToolJson({
      url: `${this.options.apiBase.replace(/\/$/, "")}/weather`,
      query: {
        q: city,
        appid: this.options.apiKey,
        units,
      },
      timeoutMs: this.options.timeoutMs,
      signal: context.signal,
      fetchImpl: this.options.fetchImpl,
    }));
    if (!body) {
      throw new ToolFault("TRANSIENT_NETWORK", "OpenWeather returned an unexpected body");
    }

    return toWeatherReport(body, units);
  }
}
