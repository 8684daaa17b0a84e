import {
  type ClockTime,
  dateKey,
  formatClockTime,
  localParts,
  mod,
  utcOffsetMinutes,
} from "../utils/local-time.js";

export interface SunLocation {
  readonly latitude: number;
  readonly longitude: number;
  /** IANA zone; when set, its offset on the given date wins over `utcOffsetMinutes`. */
  readonly timezone?: string;
  readonly utcOffsetMinutes: number;
}

export interface SunTimes {
  readonly sunrise: string;
  readonly sunset: string;
  readonly date: string;
}

const ZENITH_DEG = 90.833;
const DEFAULT_LOCATION: SunLocation = {
  latitude: 59.3293,
  longitude: 18.0686,
  utcOffsetMinutes: 60,
};

const rad = (deg: number): number => (deg * Math.PI) / 180;
const deg = (r: number): number => (r * 180) / Math.PI;

function dayOfYear(year: number, month: number, day: number): number {
  return Math.round((Date.UTC(year, month - 1, day) - Date.UTC(year, 0, 1)) / 86_400_000) + 1;
}

/**
 * Sunrise and sunset by the simplified NOAA almanac method. Accurate to a
 * few minutes, which is all a lighting schedule needs.
 */
export class SunCalculator {
  private readonly location: SunLocation;

  constructor(location: Partial<SunLocation> = {}) {
    this.location = { ...DEFAULT_LOCATION, ...location };
  }

  getSunrise(date: Date = new Date()): ClockTime {
    return this.compute(date, true);
  }

  getSunset(date: Date = new Date()): ClockTime {
    return this.compute(date, false);
  }

  getSunTimes(date: Date = new Date()): SunTimes {
    return {
      sunrise: formatClockTime(this.getSunrise(date)),
      sunset: formatClockTime(this.getSunset(date)),
      date: dateKey(localParts(date.getTime(), this.location.timezone)),
    };
  }

  private offsetHours(date: Date): number {
    const { timezone } = this.location;
    const minutes = timezone
      ? utcOffsetMinutes(date.getTime(), timezone)
      : this.location.utcOffsetMinutes;
    return minutes / 60;
  }

  private compute(date: Date, rising: boolean): ClockTime {
    const { latitude, longitude, timezone } = this.location;
    const parts = localParts(date.getTime(), timezone);
    const n = dayOfYear(parts.year, parts.month, parts.day);

    const lngHour = longitude / 15;
    const t = n + ((rising ? 6 : 18) - lngHour) / 24;

    const meanAnomaly = 0.9856 * t - 3.289;
    const trueLong = mod(
      meanAnomaly + 1.916 * Math.sin(rad(meanAnomaly)) + 0.02 * Math.sin(rad(2 * meanAnomaly)) + 282.634,
      360,
    );

    let ra = mod(deg(Math.atan(0.91764 * Math.tan(rad(trueLong)))), 360);
    // Right ascension must sit in the same quadrant as the true longitude
    ra += Math.floor(trueLong / 90) * 90 - Math.floor(ra / 90) * 90;
    ra /= 15;

    const sinDec = 0.39782 * Math.sin(rad(trueLong));
    const cosDec = Math.cos(Math.asin(sinDec));
    const rawCosH =
      (Math.cos(rad(ZENITH_DEG)) - sinDec * Math.sin(rad(latitude))) / (cosDec * Math.cos(rad(latitude)));
    // Polar day/night: pin to the nearest defined value
    const cosH = Math.max(-1, Math.min(1, rawCosH));

    const hourAngle = (rising ? 360 - deg(Math.acos(cosH)) : deg(Math.acos(cosH))) / 15;
    const localMean = hourAngle + ra - 0.06571 * t - 6.622;
    const ut = mod(localMean - lngHour, 24);
    const local = mod(ut + this.offsetHours(date), 24);

    const hour = Math.trunc(local);
    const minute = Math.trunc((local - hour) * 60);
    return { hour, minute };
  }
}
