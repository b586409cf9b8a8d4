/*~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~
 Copyright (c) 2023, David Beaumont (https://github.com/hagbard).

 This program and the accompanying materials are made available under the terms of the
 Eclipse Public License v. 2.0 available at https://www.eclipse.org/legal/epl-2.0, or the
 Apache License, Version 2.0 available at https://www.apache.org/licenses/LICENSE-2.0.

 SPDX-License-Identifier: EPL-2.0 OR Apache-2.0
 ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~*/

import { PhoneNumberType } from "./match-results.js";

/**
 * Describes the numbers of a single type (or all valid numbers) in a region. Immutable.
 */
export interface NumberDesc {
  /** Pattern for the whole national significant number, or null if no number can match. */
  readonly nationalNumberPattern: string|null;
  /**
   * Sorted possible lengths. An empty list means "same as the general descriptor", and a single
   * entry of -1 means no number of this type exists in the region.
   */
  readonly possibleLengths: ReadonlyArray<number>;
  readonly possibleLengthsLocalOnly: ReadonlyArray<number>;
  readonly exampleNumber: string|null;
}

/** A rule for formatting national significant numbers which match it. Immutable. */
export interface NumberFormat {
  readonly pattern: string;
  readonly format: string;
  /** Patterns for the leading digits of a number, from least to most specific. */
  readonly leadingDigitsPatterns: ReadonlyArray<string>;
  /**
   * Template for prefixing the first group in national format (e.g. "0$1" or "($1)"), already
   * resolved against the national prefix. Empty if no national prefix is added.
   */
  readonly nationalPrefixFormattingRule: string;
  readonly nationalPrefixOptionalWhenFormatting: boolean;
  /** As `nationalPrefixFormattingRule`, but with a `$CC` placeholder for a carrier code. */
  readonly domesticCarrierCodeFormattingRule: string;
}

/**
 * The numbering plan of a single region (or non-geographical calling code). Immutable, and shared
 * by every caller once loaded.
 */
export interface PhoneMetadata {
  /** CLDR region code, or "001" for non-geographical entities. */
  readonly id: string;
  readonly countryCode: number;
  readonly internationalPrefix: string|null;
  readonly preferredInternationalPrefix: string|null;
  readonly nationalPrefix: string|null;
  readonly preferredExtnPrefix: string|null;
  /** Pattern matched at the start of a national number; may capture a carrier code. */
  readonly nationalPrefixForParsing: string|null;
  /** Replacement applied to a matched `nationalPrefixForParsing` (e.g. "9$1"). */
  readonly nationalPrefixTransformRule: string|null;
  readonly sameMobileAndFixedLinePattern: boolean;
  readonly numberFormats: ReadonlyArray<NumberFormat>;
  readonly intlNumberFormats: ReadonlyArray<NumberFormat>;
  readonly mainCountryForCode: boolean;
  /** Leading digits which distinguish this region from others with the same calling code. */
  readonly leadingDigits: string|null;
  readonly leadingZeroPossible: boolean;
  readonly mobileNumberPortableRegion: boolean;

  readonly generalDesc: NumberDesc;
  readonly fixedLine: NumberDesc;
  readonly mobile: NumberDesc;
  readonly tollFree: NumberDesc;
  readonly premiumRate: NumberDesc;
  readonly sharedCost: NumberDesc;
  readonly personalNumber: NumberDesc;
  readonly voip: NumberDesc;
  readonly pager: NumberDesc;
  readonly uan: NumberDesc;
  readonly emergency: NumberDesc;
  readonly voicemail: NumberDesc;
  readonly noInternationalDialling: NumberDesc;
}

/**
 * The short numbers of a single region. Short numbers are matched against their full digit
 * string, since they have no national prefix. Immutable.
 */
export interface ShortNumberMetadata {
  readonly id: string;
  readonly generalDesc: NumberDesc;
  readonly shortCode: NumberDesc;
  readonly tollFree: NumberDesc;
  readonly standardRate: NumberDesc;
  readonly premiumRate: NumberDesc;
  readonly emergency: NumberDesc;
  readonly carrierSpecific: NumberDesc;
  readonly smsServices: NumberDesc;
}

/** Descriptor used for number types which have no numbers in a region. */
export const EMPTY_NUMBER_DESC: NumberDesc = Object.freeze({
  nationalNumberPattern: null,
  possibleLengths: Object.freeze([-1]),
  possibleLengthsLocalOnly: Object.freeze([]),
  exampleNumber: null,
});

/** Whether a descriptor has any length information (i.e. it is not the "no numbers" descriptor). */
export function descHasPossibleNumberData(desc: NumberDesc): boolean {
  return desc.possibleLengths.length !== 1 || desc.possibleLengths[0] !== -1;
}

/** Whether a descriptor can provide any data at all (lengths, pattern or example number). */
export function descHasData(desc: NumberDesc): boolean {
  return desc.exampleNumber !== null
      || descHasPossibleNumberData(desc)
      || desc.nationalNumberPattern !== null;
}

/**
 * Returns the descriptor for a number type. FIXED_LINE_OR_MOBILE maps to the fixed-line
 * descriptor, and UNKNOWN to the general descriptor.
 */
export function getNumberDescByType(metadata: PhoneMetadata, type: PhoneNumberType): NumberDesc {
  switch (type) {
    case PhoneNumberType.PREMIUM_RATE:
      return metadata.premiumRate;
    case PhoneNumberType.TOLL_FREE:
      return metadata.tollFree;
    case PhoneNumberType.MOBILE:
      return metadata.mobile;
    case PhoneNumberType.FIXED_LINE:
    case PhoneNumberType.FIXED_LINE_OR_MOBILE:
      return metadata.fixedLine;
    case PhoneNumberType.SHARED_COST:
      return metadata.sharedCost;
    case PhoneNumberType.VOIP:
      return metadata.voip;
    case PhoneNumberType.PERSONAL_NUMBER:
      return metadata.personalNumber;
    case PhoneNumberType.PAGER:
      return metadata.pager;
    case PhoneNumberType.UAN:
      return metadata.uan;
    case PhoneNumberType.VOICEMAIL:
      return metadata.voicemail;
    case PhoneNumberType.UNKNOWN:
      return metadata.generalDesc;
  }
}
