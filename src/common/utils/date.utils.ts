import moment from 'moment';
import { InvalidInputError } from '../errors';
import { IsoDate } from '../types';

const ISO_DATE_FORMAT = 'YYYY-MM-DD';

export function parseIsoDate(value: IsoDate): moment.Moment {
  const parsed = moment.utc(value, ISO_DATE_FORMAT, true);
  if (!parsed.isValid()) {
    throw new InvalidInputError(`Invalid date: ${value}. Expected ${ISO_DATE_FORMAT}`);
  }
  return parsed;
}

export function isIsoDate(value: string): boolean {
  return moment.utc(value, ISO_DATE_FORMAT, true).isValid();
}

export function formatIsoDate(value: moment.Moment): IsoDate {
  return value.format(ISO_DATE_FORMAT);
}

/** Whole calendar days from `from` to `to` (negative when `to` is earlier). */
export function daysBetween(from: IsoDate, to: IsoDate): number {
  return parseIsoDate(to).diff(parseIsoDate(from), 'days');
}

export function addDays(date: IsoDate, days: number): IsoDate {
  return formatIsoDate(parseIsoDate(date).add(days, 'days'));
}

export function today(): IsoDate {
  return formatIsoDate(moment.utc());
}
