/**
 * Environment Adjusters
 *
 * Weather and rivalry scaling for a raw stat. Callers apply weather first, then rivalry.
 */

import { Weather } from './types';

export const WIND_THRESHOLD_MPH = 15;
export const WIND_PASS_PENALTY = 0.07;
export const PRECIP_PASS_PENALTY = 0.05;
export const BAD_WEATHER_GROUND_BUMP = 1.03;
export const RIVALRY_FACTOR = 0.96;

/**
 * Passing stats lose 7% at 15+ mph wind and 5% in precipitation (penalties add).
 * Everything else gets a 3% bump when either condition holds.
 * Never returns a negative value.
 */
export function applyWeatherFactor(stat: number, weather: Weather, isPassStat: boolean): number {
  const windy = weather.windMph >= WIND_THRESHOLD_MPH;

  let factor = 1.0;
  if (isPassStat) {
    if (windy) factor -= WIND_PASS_PENALTY;
    if (weather.precip) factor -= PRECIP_PASS_PENALTY;
  } else if (windy || weather.precip) {
    factor *= BAD_WEATHER_GROUND_BUMP;
  }

  return Math.max(stat * factor, 0);
}

/** Divisional familiarity suppresses explosive plays */
export function applyRivalryFactor(stat: number, isRivalry: boolean): number {
  return isRivalry ? stat * RIVALRY_FACTOR : stat;
}
