/*~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~
 Copyright (c) 2023, David Beaumont (https://github.com/hagbard).

 This program and the accompanying materials are made available under the terms of the
 Eclipse Public License v. 2.0 available at https://www.eclipse.org/legal/epl-2.0, or the
 Apache License, Version 2.0 available at https://www.apache.org/licenses/LICENSE-2.0.

 SPDX-License-Identifier: EPL-2.0 OR Apache-2.0
 ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~*/

import { PhoneNumber } from "./phone-number.js";
import { PhoneNumberType } from "./match-results.js";
import { NumberClassifier } from "./number-classifier.js";
import { PhoneNumberUtil } from "./phone-number-util.js";
import { PrefixFileReader } from "./prefix-file-reader.js";

/**
 * Provides the time zones of phone numbers, as IANA time zone identifiers (e.g.
 * "America/Los_Angeles").
 *
 * Time zone data uses the pseudo-language "" in its prefix data, with the time zones of each
 * prefix separated by '&'.
 */
export class PhoneNumberToTimeZonesMapper {
  private static readonly UNKNOWN_TIMEZONE: string = "Etc/Unknown";
  private static readonly UNKNOWN_TIME_ZONE_LIST: ReadonlyArray<string> =
      Object.freeze([PhoneNumberToTimeZonesMapper.UNKNOWN_TIMEZONE]);
  private static readonly TIME_ZONE_LANGUAGE: string = "";
  private static readonly RAW_STRING_TIMEZONES_SEPARATOR: string = "&";

  constructor(private readonly util: PhoneNumberUtil, private readonly prefixFileReader: PrefixFileReader) {}

  /** The identifier returned for numbers whose time zone is not known. */
  static getUnknownTimeZone(): string {
    return PhoneNumberToTimeZonesMapper.UNKNOWN_TIMEZONE;
  }

  /**
   * Returns the time zones of a number. Invalid numbers give the unknown time zone, and
   * non-geographical numbers give the time zones of their country.
   */
  getTimeZonesForNumber(number: PhoneNumber): ReadonlyArray<string> {
    let numberType = this.util.getNumberType(number);
    if (numberType === PhoneNumberType.UNKNOWN) {
      return PhoneNumberToTimeZonesMapper.UNKNOWN_TIME_ZONE_LIST;
    } else if (!NumberClassifier.isNumberTypeGeographical(numberType, number.getCountryCode())) {
      return this.lookupTimeZones(BigInt(number.getCountryCode()), number.getCountryCode());
    }
    return this.getTimeZonesForGeographicalNumber(number);
  }

  /**
   * Returns the time zones of a number, assuming it is a valid geographical number. Results for
   * other numbers are unspecified.
   */
  getTimeZonesForGeographicalNumber(number: PhoneNumber): ReadonlyArray<string> {
    let key = BigInt(`${number.getCountryCode()}${this.util.getNationalSignificantNumber(number)}`);
    return this.lookupTimeZones(key, number.getCountryCode());
  }

  private lookupTimeZones(key: bigint, countryCallingCode: number): ReadonlyArray<string> {
    let zones = this.prefixFileReader
        .getPrefixMap(PhoneNumberToTimeZonesMapper.TIME_ZONE_LANGUAGE, countryCallingCode)
        ?.lookup(key) ?? null;
    return zones !== null && zones.length > 0
        ? Object.freeze(zones.split(PhoneNumberToTimeZonesMapper.RAW_STRING_TIMEZONES_SEPARATOR))
        : PhoneNumberToTimeZonesMapper.UNKNOWN_TIME_ZONE_LIST;
  }
}
