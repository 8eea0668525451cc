/**
 * Reader for the ECB historical reference rate file (eurofxref-hist.xml)
 *
 * <gesmes:Envelope>
 *   <Cube>
 *     <Cube time="2024-01-15">
 *       <Cube currency="USD" rate="1.0945"/>
 *       ...
 */

import { type Currency, ParseError, compareCalendarDates, getErrorMessage, parseCalendarDate } from '@ratesync/core';
import { DOMParser } from '@xmldom/xmldom';
import { err, ok, type Result } from 'neverthrow';

import type { DailySnapshot } from '../core/types.js';

type XmlDocument = ReturnType<DOMParser['parseFromString']>;

function parseXml(xml: string, provider: string): Result<XmlDocument, ParseError> {
  try {
    return ok(new DOMParser().parseFromString(xml, 'text/xml'));
  } catch (error) {
    return err(new ParseError(`Malformed ECB history file: ${getErrorMessage(error)}`, provider));
  }
}

export function parseEcbHistoryXml(xml: string, base: Currency, provider: string): Result<DailySnapshot[], ParseError> {
  const doc = parseXml(xml, provider);
  if (doc.isErr()) {
    return err(doc.error);
  }

  const cubes = doc.value.getElementsByTagName('Cube');
  const snapshots: DailySnapshot[] = [];

  for (let i = 0; i < cubes.length; i++) {
    const dayCube = cubes.item(i);
    const time = dayCube?.getAttribute('time');
    if (!dayCube || !time) {
      continue;
    }

    const date = parseCalendarDate(time);
    if (date.isErr()) {
      return err(new ParseError(`ECB history file has an invalid date: ${time}`, provider));
    }

    const rates: Record<string, number> = {};
    const rateCubes = dayCube.getElementsByTagName('Cube');
    for (let j = 0; j < rateCubes.length; j++) {
      const rateCube = rateCubes.item(j);
      const currency = rateCube?.getAttribute('currency');
      const rate = rateCube?.getAttribute('rate');
      if (!currency || !rate) {
        continue;
      }
      const value = Number(rate);
      if (Number.isNaN(value)) {
        return err(new ParseError(`ECB history file has an invalid rate for ${currency} on ${time}: ${rate}`, provider));
      }
      rates[currency.toUpperCase()] = value;
    }

    snapshots.push({ base, date: date.value, provider, rates });
  }

  if (snapshots.length === 0) {
    return err(new ParseError('ECB history file contains no dated Cube elements', provider));
  }

  return ok(snapshots.sort((a, b) => compareCalendarDates(a.date, b.date)));
}
