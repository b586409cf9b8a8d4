/*~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~
 Copyright (c) 2023, David Beaumont (https://github.com/hagbard).

 This program and the accompanying materials are made available under the terms of the
 Eclipse Public License v. 2.0 available at https://www.eclipse.org/legal/epl-2.0, or the
 Apache License, Version 2.0 available at https://www.apache.org/licenses/LICENSE-2.0.

 SPDX-License-Identifier: EPL-2.0 OR Apache-2.0
 ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~*/

import { PhoneNumber } from "./phone-number.js";
import { MetadataSource } from "./metadata-source.js";
import { NumberDesc, ShortNumberMetadata } from "./phone-metadata.js";
import { PhoneNumberNormalizer } from "./phone-number-normalizer.js";
import { RegexCache } from "./regex-cache.js";

/** Cost categories of short numbers. */
export enum ShortNumberCost {
  TOLL_FREE = "TOLL_FREE",
  STANDARD_RATE = "STANDARD_RATE",
  PREMIUM_RATE = "PREMIUM_RATE",
  UNKNOWN_COST = "UNKNOWN_COST",
}

/**
 * Information about short numbers, such as emergency numbers and short codes, which can only be
 * dialled within their own region. Most commercial short numbers are not covered here, but by
 * `PhoneNumberUtil`.
 *
 * Short numbers are represented as a `PhoneNumber` whose national number is the dialled digits,
 * and whose calling code is that of the region they are dialled in:
 *
 * ```
 * let info = new ShortNumberInfo(source);
 * info.isValidShortNumberForRegion(util.parse("911", "US"), "US");  // true
 * ```
 */
export class ShortNumberInfo {
  // Regions where an emergency number followed by extra digits no longer reaches the emergency
  // service.
  private static readonly REGIONS_WHERE_EMERGENCY_NUMBERS_MUST_BE_EXACT: ReadonlySet<string> =
      new Set(["BR", "CL", "NI"]);

  constructor(
      private readonly source: MetadataSource,
      private readonly regexCache: RegexCache = new RegexCache()) {}

  /**
   * Whether a short number has a possible length for the region it is dialled from. This is a
   * more lenient check than `isValidShortNumberForRegion()`.
   */
  isPossibleShortNumberForRegion(number: PhoneNumber, regionDialingFrom: string): boolean {
    let metadata = this.getMetadataIfDialableFrom(number, regionDialingFrom);
    return metadata !== null
        && metadata.generalDesc.possibleLengths.includes(ShortNumberInfo.getNationalSignificantNumber(number).length);
  }

  /**
   * Whether a short number has a possible length in any region sharing its calling code. This is
   * a more lenient check than `isValidShortNumber()`.
   */
  isPossibleShortNumber(number: PhoneNumber): boolean {
    let length = ShortNumberInfo.getNationalSignificantNumber(number).length;
    return this.source.getRegionCodesForCountryCode(number.getCountryCode()).some(regionCode => {
      let metadata = this.source.getShortNumberMetadataForRegion(regionCode);
      return metadata !== null && metadata.generalDesc.possibleLengths.includes(length);
    });
  }

  /**
   * Whether a short number matches a valid pattern in the region it is dialled from. This does
   * not mean the number is in use.
   */
  isValidShortNumberForRegion(number: PhoneNumber, regionDialingFrom: string|null): boolean {
    let metadata = this.getMetadataIfDialableFrom(number, regionDialingFrom);
    if (metadata === null) {
      return false;
    }
    let shortNumber = ShortNumberInfo.getNationalSignificantNumber(number);
    return this.matchesPossibleNumberAndNationalNumber(shortNumber, metadata.generalDesc)
        && this.matchesPossibleNumberAndNationalNumber(shortNumber, metadata.shortCode);
  }

  /** Whether a short number is valid in any region sharing its calling code. */
  isValidShortNumber(number: PhoneNumber): boolean {
    let regionCodes = this.source.getRegionCodesForCountryCode(number.getCountryCode());
    let regionCode = this.getRegionCodeForShortNumberFromRegionList(number, regionCodes);
    if (regionCodes.length > 1 && regionCode !== null) {
      // Finding the region among several already required the number to be a valid short code.
      return true;
    }
    return this.isValidShortNumberForRegion(number, regionCode);
  }

  /**
   * Returns the expected cost of a short number when dialled from a region. Emergency numbers
   * are always toll free. Nothing is implied about validity, and an invalid number may match any
   * cost category.
   */
  getExpectedCostForRegion(number: PhoneNumber, regionDialingFrom: string): ShortNumberCost {
    let metadata = this.getMetadataIfDialableFrom(number, regionDialingFrom);
    if (metadata === null) {
      return ShortNumberCost.UNKNOWN_COST;
    }
    let shortNumber = ShortNumberInfo.getNationalSignificantNumber(number);
    // Cost categories only list lengths which differ from the general descriptor.
    if (!metadata.generalDesc.possibleLengths.includes(shortNumber.length)) {
      return ShortNumberCost.UNKNOWN_COST;
    }
    // Most expensive first, in case the patterns overlap.
    if (this.matchesPossibleNumberAndNationalNumber(shortNumber, metadata.premiumRate)) {
      return ShortNumberCost.PREMIUM_RATE;
    }
    if (this.matchesPossibleNumberAndNationalNumber(shortNumber, metadata.standardRate)) {
      return ShortNumberCost.STANDARD_RATE;
    }
    if (this.matchesPossibleNumberAndNationalNumber(shortNumber, metadata.tollFree)) {
      return ShortNumberCost.TOLL_FREE;
    }
    if (this.isEmergencyNumber(shortNumber, regionDialingFrom)) {
      return ShortNumberCost.TOLL_FREE;
    }
    return ShortNumberCost.UNKNOWN_COST;
  }

  /**
   * Returns the expected cost of a short number. Where several regions share the calling code,
   * the highest cost among them is returned, in the order PREMIUM_RATE, UNKNOWN_COST,
   * STANDARD_RATE, TOLL_FREE. A number of unknown cost in any region might be premium rate, so
   * it ranks above standard rate.
   */
  getExpectedCost(number: PhoneNumber): ShortNumberCost {
    let regionCodes = this.source.getRegionCodesForCountryCode(number.getCountryCode());
    if (regionCodes.length === 0) {
      return ShortNumberCost.UNKNOWN_COST;
    }
    if (regionCodes.length === 1) {
      return this.getExpectedCostForRegion(number, regionCodes[0]);
    }
    let cost = ShortNumberCost.TOLL_FREE;
    for (let regionCode of regionCodes) {
      switch (this.getExpectedCostForRegion(number, regionCode)) {
        case ShortNumberCost.PREMIUM_RATE:
          return ShortNumberCost.PREMIUM_RATE;
        case ShortNumberCost.UNKNOWN_COST:
          cost = ShortNumberCost.UNKNOWN_COST;
          break;
        case ShortNumberCost.STANDARD_RATE:
          if (cost !== ShortNumberCost.UNKNOWN_COST) {
            cost = ShortNumberCost.STANDARD_RATE;
          }
          break;
        case ShortNumberCost.TOLL_FREE:
          break;
      }
    }
    return cost;
  }

  /** Returns a valid short number for a region, or the empty string if there is none. */
  getExampleShortNumber(regionCode: string): string {
    return this.source.getShortNumberMetadataForRegion(regionCode)?.shortCode.exampleNumber ?? "";
  }

  /**
   * Returns a short number of the given cost for a region, or the empty string if there is none.
   * There are never examples of UNKNOWN_COST numbers.
   */
  getExampleShortNumberForCost(regionCode: string, cost: ShortNumberCost): string {
    let metadata = this.source.getShortNumberMetadataForRegion(regionCode);
    if (metadata === null) {
      return "";
    }
    let desc: NumberDesc|null = null;
    switch (cost) {
      case ShortNumberCost.TOLL_FREE:
        desc = metadata.tollFree;
        break;
      case ShortNumberCost.STANDARD_RATE:
        desc = metadata.standardRate;
        break;
      case ShortNumberCost.PREMIUM_RATE:
        desc = metadata.premiumRate;
        break;
      case ShortNumberCost.UNKNOWN_COST:
        break;
    }
    return desc?.exampleNumber ?? "";
  }

  /**
   * Whether dialling the given text in a region would connect to an emergency service. Extra
   * digits after an emergency number are allowed, except in regions where they prevent the call
   * from connecting. Text starting with a plus sign never connects to an emergency service.
   */
  connectsToEmergencyNumber(number: string, regionCode: string): boolean {
    return this.matchesEmergencyNumber(number, regionCode, true);
  }

  /** Whether the given text is exactly an emergency number of a region. */
  isEmergencyNumber(number: string, regionCode: string): boolean {
    return this.matchesEmergencyNumber(number, regionCode, false);
  }

  /**
   * Whether a short number is carrier specific (i.e. only works with some carriers) in the first
   * region sharing its calling code where it is a valid short code.
   */
  isCarrierSpecific(number: PhoneNumber): boolean {
    let regionCodes = this.source.getRegionCodesForCountryCode(number.getCountryCode());
    let regionCode = this.getRegionCodeForShortNumberFromRegionList(number, regionCodes);
    let metadata = regionCode !== null ? this.source.getShortNumberMetadataForRegion(regionCode) : null;
    return metadata !== null
        && this.matchesPossibleNumberAndNationalNumber(
            ShortNumberInfo.getNationalSignificantNumber(number), metadata.carrierSpecific);
  }

  isCarrierSpecificForRegion(number: PhoneNumber, regionDialingFrom: string): boolean {
    let metadata = this.getMetadataIfDialableFrom(number, regionDialingFrom);
    return metadata !== null
        && this.matchesPossibleNumberAndNationalNumber(
            ShortNumberInfo.getNationalSignificantNumber(number), metadata.carrierSpecific);
  }

  /** Whether a short number is used for SMS services (e.g. to vote or donate) in a region. */
  isSmsServiceForRegion(number: PhoneNumber, regionDialingFrom: string): boolean {
    let metadata = this.getMetadataIfDialableFrom(number, regionDialingFrom);
    return metadata !== null
        && this.matchesPossibleNumberAndNationalNumber(
            ShortNumberInfo.getNationalSignificantNumber(number), metadata.smsServices);
  }

  // Short number metadata for the region, if the number's calling code is used in that region.
  private getMetadataIfDialableFrom(number: PhoneNumber, regionDialingFrom: string|null): ShortNumberMetadata|null {
    if (regionDialingFrom === null
        || !this.source.getRegionCodesForCountryCode(number.getCountryCode()).includes(regionDialingFrom)) {
      return null;
    }
    return this.source.getShortNumberMetadataForRegion(regionDialingFrom);
  }

  // Where there are several regions, the first in which the number is a valid short code.
  private getRegionCodeForShortNumberFromRegionList(
      number: PhoneNumber, regionCodes: ReadonlyArray<string>): string|null {
    if (regionCodes.length === 0) {
      return null;
    } else if (regionCodes.length === 1) {
      return regionCodes[0];
    }
    let nationalNumber = ShortNumberInfo.getNationalSignificantNumber(number);
    for (let regionCode of regionCodes) {
      let metadata = this.source.getShortNumberMetadataForRegion(regionCode);
      if (metadata !== null && this.matchesPossibleNumberAndNationalNumber(nationalNumber, metadata.shortCode)) {
        return regionCode;
      }
    }
    return null;
  }

  private matchesEmergencyNumber(number: string, regionCode: string, allowPrefixMatch: boolean): boolean {
    let possibleNumber = PhoneNumberNormalizer.extractPossibleNumber(number);
    if (possibleNumber.length > 0 && PhoneNumberNormalizer.PLUS_CHARS.includes(possibleNumber.charAt(0))) {
      // Calling codes are never dialled before an emergency number.
      return false;
    }
    let metadata = this.source.getShortNumberMetadataForRegion(regionCode);
    let pattern = metadata?.emergency.nationalNumberPattern ?? null;
    if (pattern === null) {
      return false;
    }
    let normalizedNumber = PhoneNumberNormalizer.normalizeDigitsOnly(possibleNumber);
    if (allowPrefixMatch && !ShortNumberInfo.REGIONS_WHERE_EMERGENCY_NUMBERS_MUST_BE_EXACT.has(regionCode)) {
      return this.regexCache.lookingAt(pattern, normalizedNumber) !== null;
    }
    return this.regexCache.matchesEntirely(pattern, normalizedNumber);
  }

  private matchesPossibleNumberAndNationalNumber(number: string, desc: NumberDesc): boolean {
    if (desc.possibleLengths.length > 0 && !desc.possibleLengths.includes(number.length)) {
      return false;
    }
    return desc.nationalNumberPattern !== null && this.regexCache.matchesEntirely(desc.nationalNumberPattern, number);
  }

  private static getNationalSignificantNumber(number: PhoneNumber): string {
    return "0".repeat(number.getNumberOfLeadingZeros()) + number.getNationalNumber().toString();
  }
}
