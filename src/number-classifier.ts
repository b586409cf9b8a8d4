/*~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~
 Copyright (c) 2023, David Beaumont (https://github.com/hagbard).

 This program and the accompanying materials are made available under the terms of the
 Eclipse Public License v. 2.0 available at https://www.eclipse.org/legal/epl-2.0, or the
 Apache License, Version 2.0 available at https://www.apache.org/licenses/LICENSE-2.0.

 SPDX-License-Identifier: EPL-2.0 OR Apache-2.0
 ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~*/

import { PhoneNumber } from "./phone-number.js";
import { PhoneNumberType, ValidationResult } from "./match-results.js";
import {
    descHasData,
    descHasPossibleNumberData,
    getNumberDescByType,
    NumberDesc,
    PhoneMetadata } from "./phone-metadata.js";
import { MetadataSource } from "./metadata-source.js";
import { RegexCache } from "./regex-cache.js";
import { PhoneNumberNormalizer } from "./phone-number-normalizer.js";
import { Logger } from "./logger.js";

/**
 * Classifies and validates phone numbers against the metadata of their region.
 *
 * A number is classified by testing its national significant number against the descriptor of
 * each number type in a fixed order (premium rate first, mobile last). A number "matches" a
 * descriptor only if its length is one of the descriptor's possible lengths and the descriptor's
 * pattern matches the whole number.
 *
 * Instances are normally obtained via `PhoneNumberUtil`, which shares one instance between all
 * its operations.
 */
export class NumberClassifier {
  /** Region code for non-geographical entities (e.g. "universal freephone" numbers in +800). */
  static readonly REGION_CODE_FOR_NON_GEO_ENTITY: string = "001";
  /** Region code returned for unknown or unresolvable regions. */
  static readonly UNKNOWN_REGION: string = "ZZ";

  private static readonly NANPA_COUNTRY_CODE: number = 1;

  // Calling codes for which mobile numbers are geographically assigned.
  private static readonly GEO_MOBILE_COUNTRIES: ReadonlySet<number> = new Set([52, 54, 55, 62, 86]);

  // Order in which types are tested, before fixed-line and mobile numbers are considered.
  private static readonly SPECIAL_TYPES: ReadonlyArray<PhoneNumberType> = [
    PhoneNumberType.PREMIUM_RATE,
    PhoneNumberType.TOLL_FREE,
    PhoneNumberType.SHARED_COST,
    PhoneNumberType.VOIP,
    PhoneNumberType.PERSONAL_NUMBER,
    PhoneNumberType.PAGER,
    PhoneNumberType.UAN,
    PhoneNumberType.VOICEMAIL,
  ];

  constructor(
      private readonly source: MetadataSource,
      private readonly regexCache: RegexCache,
      private readonly log: Logger) {}

  getMetadataSource(): MetadataSource {
    return this.source;
  }

  getRegexCache(): RegexCache {
    return this.regexCache;
  }

  /**
   * Returns the national significant number of a phone number, including any leading zeros. This
   * never includes the national prefix or the country calling code.
   */
  getNationalSignificantNumber(number: PhoneNumber): string {
    return "0".repeat(number.getNumberOfLeadingZeros()) + number.getNationalNumber().toString();
  }

  /** Whether the given string is a supported CLDR region code (not including "001"). */
  isValidRegionCode(regionCode: string|null|undefined): regionCode is string {
    return typeof regionCode === "string" && this.source.getMetadataForRegion(regionCode) !== null;
  }

  hasValidCountryCallingCode(countryCallingCode: number): boolean {
    return this.source.getRegionCodesForCountryCode(countryCallingCode).length > 0;
  }

  /** Returns metadata for a region, or for the calling code if the region is "001". */
  getMetadataForRegionOrCallingCode(
      countryCallingCode: number, regionCode: string|null): PhoneMetadata|null {
    if (regionCode === NumberClassifier.REGION_CODE_FOR_NON_GEO_ENTITY) {
      return this.source.getMetadataForNonGeographicalRegion(countryCallingCode);
    }
    return regionCode !== null ? this.source.getMetadataForRegion(regionCode) : null;
  }

  /**
   * Returns the main region code for a calling code (e.g. "US" for 1 and "GB" for 44), "001" for
   * non-geographical calling codes, and "ZZ" for unknown calling codes.
   */
  getRegionCodeForCountryCode(countryCallingCode: number): string {
    let regions = this.source.getRegionCodesForCountryCode(countryCallingCode);
    return regions.length > 0 ? regions[0] : NumberClassifier.UNKNOWN_REGION;
  }

  /** Returns the calling code for a region, or 0 if the region is not supported. */
  getCountryCodeForRegion(regionCode: string|null): number {
    let metadata = regionCode !== null ? this.source.getMetadataForRegion(regionCode) : null;
    if (metadata === null) {
      this.log.warn({ region: regionCode }, "invalid or missing region code provided");
      return 0;
    }
    return metadata.countryCode;
  }

  /**
   * Returns the region a number belongs to. Where several regions share a calling code, the first
   * region whose leading digits (or, failing that, whose number patterns) match is returned.
   * Returns null if no region can be identified.
   */
  getRegionCodeForNumber(number: PhoneNumber): string|null {
    let regions = this.source.getRegionCodesForCountryCode(number.getCountryCode());
    if (regions.length === 0) {
      this.log.debug({ callingCode: number.getCountryCode() }, "missing or invalid calling code");
      return null;
    }
    if (regions.length === 1) {
      return regions[0];
    }
    return this.getRegionCodeForNumberFromRegionList(number, regions);
  }

  private getRegionCodeForNumberFromRegionList(
      number: PhoneNumber, regionCodes: ReadonlyArray<string>): string|null {
    let nsn = this.getNationalSignificantNumber(number);
    for (let regionCode of regionCodes) {
      let metadata = this.source.getMetadataForRegion(regionCode);
      if (metadata === null) {
        continue;
      }
      if (metadata.leadingDigits !== null) {
        if (this.regexCache.lookingAt(metadata.leadingDigits, nsn) !== null) {
          return regionCode;
        }
      } else if (this.getNumberTypeHelper(nsn, metadata) !== PhoneNumberType.UNKNOWN) {
        return regionCode;
      }
    }
    return null;
  }

  /**
   * Returns the national dialling prefix of a region (e.g. "0" for GB), or null if the region has
   * none or is not supported. The '~' (wait for dial tone) symbol is removed if `stripNonDigits`
   * is set.
   */
  getNddPrefixForRegion(regionCode: string|null, stripNonDigits: boolean): string|null {
    let metadata = regionCode !== null ? this.source.getMetadataForRegion(regionCode) : null;
    if (metadata === null) {
      this.log.warn({ region: regionCode }, "invalid or missing region code provided");
      return null;
    }
    let nationalPrefix = metadata.nationalPrefix;
    if (nationalPrefix === null) {
      return null;
    }
    return stripNonDigits ? nationalPrefix.replace(/~/g, "") : nationalPrefix;
  }

  /** Whether the given region belongs to the North American Numbering Plan (calling code 1). */
  isNANPACountry(regionCode: string|null): boolean {
    let metadata = regionCode !== null ? this.source.getMetadataForRegion(regionCode) : null;
    return metadata !== null && metadata.countryCode === NumberClassifier.NANPA_COUNTRY_CODE;
  }

  /** Whether the national number pattern of the descriptor matches the whole number. */
  matchesNationalNumberPattern(nsn: string, desc: NumberDesc): boolean {
    return desc.nationalNumberPattern !== null
        && this.regexCache.matchesEntirely(desc.nationalNumberPattern, nsn);
  }

  /**
   * Whether a national significant number matches a descriptor: its length must be possible for
   * the descriptor (if it lists lengths) and the descriptor's pattern must match it entirely.
   */
  isNumberMatchingDesc(nsn: string, desc: NumberDesc): boolean {
    if (desc.possibleLengths.length > 0 && !desc.possibleLengths.includes(nsn.length)) {
      return false;
    }
    return this.matchesNationalNumberPattern(nsn, desc);
  }

  /** Returns the type of a number, or UNKNOWN if it is not valid. */
  getNumberType(number: PhoneNumber): PhoneNumberType {
    let regionCode = this.getRegionCodeForNumber(number);
    let metadata = this.getMetadataForRegionOrCallingCode(number.getCountryCode(), regionCode);
    if (metadata === null) {
      return PhoneNumberType.UNKNOWN;
    }
    return this.getNumberTypeHelper(this.getNationalSignificantNumber(number), metadata);
  }

  /** Classifies a national significant number against the given metadata. */
  getNumberTypeHelper(nsn: string, metadata: PhoneMetadata): PhoneNumberType {
    if (!this.isNumberMatchingDesc(nsn, metadata.generalDesc)) {
      return PhoneNumberType.UNKNOWN;
    }
    for (let type of NumberClassifier.SPECIAL_TYPES) {
      if (this.isNumberMatchingDesc(nsn, getNumberDescByType(metadata, type))) {
        return type;
      }
    }
    if (this.isNumberMatchingDesc(nsn, metadata.fixedLine)) {
      if (metadata.sameMobileAndFixedLinePattern
          || this.isNumberMatchingDesc(nsn, metadata.mobile)) {
        return PhoneNumberType.FIXED_LINE_OR_MOBILE;
      }
      return PhoneNumberType.FIXED_LINE;
    }
    // If the mobile and fixed-line patterns are the same, the fixed-line test above would already
    // have matched.
    if (!metadata.sameMobileAndFixedLinePattern
        && this.isNumberMatchingDesc(nsn, metadata.mobile)) {
      return PhoneNumberType.MOBILE;
    }
    return PhoneNumberType.UNKNOWN;
  }

  /**
   * Whether a number is valid. This checks the length and the pattern of the number against the
   * metadata of the region it belongs to (as determined by `getRegionCodeForNumber()`).
   */
  isValidNumber(number: PhoneNumber): boolean {
    let regionCode = this.getRegionCodeForNumber(number);
    return regionCode !== null && this.isValidNumberForRegion(number, regionCode);
  }

  /**
   * Whether a number is valid for a specific region. A number which is valid in one region is never
   * valid in a region with a different calling code.
   */
  isValidNumberForRegion(number: PhoneNumber, regionCode: string): boolean {
    let countryCode = number.getCountryCode();
    let metadata = this.getMetadataForRegionOrCallingCode(countryCode, regionCode);
    if (metadata === null
        || (regionCode !== NumberClassifier.REGION_CODE_FOR_NON_GEO_ENTITY
            && countryCode !== metadata.countryCode)) {
      return false;
    }
    let nsn = this.getNationalSignificantNumber(number);
    if (metadata.generalDesc.nationalNumberPattern === null) {
      // Without detailed metadata only the length of the number can be tested.
      return nsn.length > PhoneNumberNormalizer.MIN_LENGTH_FOR_NSN
          && nsn.length <= PhoneNumberNormalizer.MAX_LENGTH_FOR_NSN;
    }
    return this.getNumberTypeHelper(nsn, metadata) !== PhoneNumberType.UNKNOWN;
  }

  /**
   * Tests the length of a national number against the possible lengths of a number type in the
   * given metadata. For FIXED_LINE_OR_MOBILE the lengths of both types are considered.
   */
  testNumberLength(
      nsn: string,
      metadata: PhoneMetadata,
      type: PhoneNumberType = PhoneNumberType.UNKNOWN): ValidationResult {
    let descForType = getNumberDescByType(metadata, type);
    // An empty list means the lengths are the same as the general descriptor.
    let possibleLengths: number[] = descForType.possibleLengths.length === 0
        ? [...metadata.generalDesc.possibleLengths]
        : [...descForType.possibleLengths];
    let localLengths: number[] = [...descForType.possibleLengthsLocalOnly];

    if (type === PhoneNumberType.FIXED_LINE_OR_MOBILE) {
      if (!descHasPossibleNumberData(metadata.fixedLine)) {
        return this.testNumberLength(nsn, metadata, PhoneNumberType.MOBILE);
      }
      let mobileDesc = metadata.mobile;
      if (descHasPossibleNumberData(mobileDesc)) {
        let mobileLengths = mobileDesc.possibleLengths.length === 0
            ? metadata.generalDesc.possibleLengths
            : mobileDesc.possibleLengths;
        possibleLengths = [...new Set([...possibleLengths, ...mobileLengths])].sort((a, b) => a - b);
        localLengths = [...new Set([...localLengths, ...mobileDesc.possibleLengthsLocalOnly])]
            .sort((a, b) => a - b);
      }
    }

    let actualLength = nsn.length;
    if (possibleLengths.length === 0) {
      // No length data at all (malformed metadata), so only the global limits apply.
      if (actualLength <= PhoneNumberNormalizer.MIN_LENGTH_FOR_NSN) {
        return ValidationResult.TOO_SHORT;
      }
      return actualLength > PhoneNumberNormalizer.MAX_LENGTH_FOR_NSN
          ? ValidationResult.TOO_LONG
          : ValidationResult.IS_POSSIBLE;
    }
    // No numbers of this type exist in the region.
    if (possibleLengths[0] === -1) {
      return ValidationResult.INVALID_LENGTH;
    }
    if (localLengths.includes(actualLength)) {
      return ValidationResult.IS_POSSIBLE_LOCAL_ONLY;
    }
    let minimumLength = possibleLengths[0];
    if (minimumLength === actualLength) {
      return ValidationResult.IS_POSSIBLE;
    } else if (minimumLength > actualLength) {
      return ValidationResult.TOO_SHORT;
    } else if (possibleLengths[possibleLengths.length - 1] < actualLength) {
      return ValidationResult.TOO_LONG;
    }
    return possibleLengths.slice(1).includes(actualLength)
        ? ValidationResult.IS_POSSIBLE
        : ValidationResult.INVALID_LENGTH;
  }

  /**
   * Tests whether a number has a possible length for its calling code (and optionally for a
   * specific number type). This is much faster than full validation.
   */
  isPossibleNumberForTypeWithReason(number: PhoneNumber, type: PhoneNumberType): ValidationResult {
    let countryCode = number.getCountryCode();
    if (!this.hasValidCountryCallingCode(countryCode)) {
      return ValidationResult.INVALID_COUNTRY_CODE;
    }
    let regionCode = this.getRegionCodeForCountryCode(countryCode);
    let metadata = this.getMetadataForRegionOrCallingCode(countryCode, regionCode);
    if (metadata === null) {
      return ValidationResult.INVALID_COUNTRY_CODE;
    }
    return this.testNumberLength(this.getNationalSignificantNumber(number), metadata, type);
  }

  isPossibleNumberWithReason(number: PhoneNumber): ValidationResult {
    return this.isPossibleNumberForTypeWithReason(number, PhoneNumberType.UNKNOWN);
  }

  isPossibleNumberForType(number: PhoneNumber, type: PhoneNumberType): boolean {
    let result = this.isPossibleNumberForTypeWithReason(number, type);
    return result === ValidationResult.IS_POSSIBLE
        || result === ValidationResult.IS_POSSIBLE_LOCAL_ONLY;
  }

  isPossibleNumber(number: PhoneNumber): boolean {
    return this.isPossibleNumberForType(number, PhoneNumberType.UNKNOWN);
  }

  /**
   * Whether a number can be dialled from outside its region. Numbers which cannot (e.g. some
   * domestic-only toll free numbers) are listed in the region's "no international dialling"
   * descriptor. Returns true if the region is unknown.
   */
  canBeInternationallyDialled(number: PhoneNumber): boolean {
    let regionCode = this.getRegionCodeForNumber(number);
    let metadata = regionCode !== null ? this.source.getMetadataForRegion(regionCode) : null;
    if (metadata === null) {
      return true;
    }
    return !this.isNumberMatchingDesc(
        this.getNationalSignificantNumber(number), metadata.noInternationalDialling);
  }

  /**
   * Whether a number is geographical (i.e. associated with a location). Fixed-line numbers are
   * always geographical, and mobile numbers are for some calling codes (e.g. Mexico and Brazil).
   */
  isNumberGeographical(number: PhoneNumber): boolean {
    return NumberClassifier.isNumberTypeGeographical(
        this.getNumberType(number), number.getCountryCode());
  }

  static isNumberTypeGeographical(type: PhoneNumberType, countryCallingCode: number): boolean {
    return type === PhoneNumberType.FIXED_LINE
        || type === PhoneNumberType.FIXED_LINE_OR_MOBILE
        || (NumberClassifier.GEO_MOBILE_COUNTRIES.has(countryCallingCode)
            && type === PhoneNumberType.MOBILE);
  }

  /** Whether mobile numbers in the region can be ported between carriers. */
  isMobileNumberPortableRegion(regionCode: string): boolean {
    let metadata = this.source.getMetadataForRegion(regionCode);
    if (metadata === null) {
      this.log.warn({ region: regionCode }, "invalid or unknown region code provided");
      return false;
    }
    return metadata.mobileNumberPortableRegion;
  }

  /**
   * Returns the number types which have data for a region (never including FIXED_LINE_OR_MOBILE or
   * UNKNOWN). Returns an empty set for unknown regions.
   */
  getSupportedTypesForRegion(regionCode: string): ReadonlySet<PhoneNumberType> {
    let metadata = this.source.getMetadataForRegion(regionCode);
    return metadata !== null ? NumberClassifier.getSupportedTypes(metadata) : new Set();
  }

  getSupportedTypesForNonGeoEntity(countryCallingCode: number): ReadonlySet<PhoneNumberType> {
    let metadata = this.source.getMetadataForNonGeographicalRegion(countryCallingCode);
    return metadata !== null ? NumberClassifier.getSupportedTypes(metadata) : new Set();
  }

  private static getSupportedTypes(metadata: PhoneMetadata): ReadonlySet<PhoneNumberType> {
    let types = new Set<PhoneNumberType>();
    for (let type of Object.values(PhoneNumberType)) {
      if (type === PhoneNumberType.FIXED_LINE_OR_MOBILE || type === PhoneNumberType.UNKNOWN) {
        continue;
      }
      if (descHasData(getNumberDescByType(metadata, type))) {
        types.add(type);
      }
    }
    return types;
  }
}
