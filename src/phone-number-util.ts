/*~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~
 Copyright (c) 2023, David Beaumont (https://github.com/hagbard).

 This program and the accompanying materials are made available under the terms of the
 Eclipse Public License v. 2.0 available at https://www.eclipse.org/legal/epl-2.0, or the
 Apache License, Version 2.0 available at https://www.apache.org/licenses/LICENSE-2.0.

 SPDX-License-Identifier: EPL-2.0 OR Apache-2.0
 ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~*/

import { PhoneNumber } from "./phone-number.js";
import { MetadataSource } from "./metadata-source.js";
import { NumberFormat, PhoneMetadata, getNumberDescByType } from "./phone-metadata.js";
import { RegexCache } from "./regex-cache.js";
import { NumberClassifier } from "./number-classifier.js";
import { PhoneNumberNormalizer } from "./phone-number-normalizer.js";
import { PhoneNumberParser, StrippedNationalPrefix } from "./phone-number-parser.js";
import { PhoneNumberFormat, PhoneNumberFormatter } from "./phone-number-formatter.js";
import { PhoneNumberMatch } from "./phone-number-match.js";
import { Leniency, PhoneNumberMatcher } from "./phone-number-matcher.js";
import { MatchType, PhoneNumberType, ValidationResult } from "./match-results.js";
import { ErrorType, NumberParseError } from "./number-parse-error.js";
import { Logger, childLogger } from "./logger.js";
import { ShortNumberInfo } from "./short-number-info.js";
import { AsYouTypeFormatter } from "./as-you-type-formatter.js";

/** Options for constructing a `PhoneNumberUtil`. */
export interface PhoneNumberUtilOptions {
  /** Logger for the engine and its parts (defaults to a child of the library's root logger). */
  readonly logger?: Logger;
}

/**
 * The phone number engine: parsing, validation, formatting, matching and finding numbers in text.
 *
 * An instance owns its metadata source and pattern cache, and should be created once and shared.
 * Metadata for a region is only loaded when first needed.
 *
 * ```
 * let util = new PhoneNumberUtil(JsonMetadataSource.create(json));
 * let number = util.parse("(650) 253-0000", "US");
 * util.format(number, PhoneNumberFormat.E164);  // "+16502530000"
 * ```
 */
export class PhoneNumberUtil {
  /** Region code used for numbers whose region is not known (e.g. when parsing). */
  static readonly UNKNOWN_REGION: string = NumberClassifier.UNKNOWN_REGION;
  static readonly REGION_CODE_FOR_NON_GEO_ENTITY: string = NumberClassifier.REGION_CODE_FOR_NON_GEO_ENTITY;

  // Calling codes of regions where a mobile token precedes the area code in mobile numbers.
  private static readonly MOBILE_TOKEN_MAPPINGS: ReadonlyMap<number, string> = new Map([[54, "9"]]);
  // Calling codes with geographical mobile numbers but no area codes for them.
  private static readonly GEO_MOBILE_COUNTRIES_WITHOUT_MOBILE_AREA_CODES: ReadonlySet<number> = new Set([86]);
  // Types tried, in order, for an example number of a non-geographical entity.
  private static readonly NON_GEO_EXAMPLE_TYPES: ReadonlyArray<PhoneNumberType> = [
    PhoneNumberType.MOBILE,
    PhoneNumberType.TOLL_FREE,
    PhoneNumberType.SHARED_COST,
    PhoneNumberType.VOIP,
    PhoneNumberType.VOICEMAIL,
    PhoneNumberType.UAN,
    PhoneNumberType.PREMIUM_RATE,
  ];

  private readonly log: Logger;
  private readonly regexCache: RegexCache = new RegexCache();
  private readonly classifier: NumberClassifier;
  private readonly parser: PhoneNumberParser;
  private readonly formatter: PhoneNumberFormatter;
  private shortNumberInfo: ShortNumberInfo|null = null;

  constructor(private readonly source: MetadataSource, options: PhoneNumberUtilOptions = {}) {
    this.log = options.logger ?? childLogger("util");
    this.classifier = new NumberClassifier(source, this.regexCache, this.log);
    this.parser = new PhoneNumberParser(this.classifier, this.log);
    this.formatter = new PhoneNumberFormatter(this.classifier, this.parser, this.log);
  }

  getMetadataSource(): MetadataSource {
    return this.source;
  }

  getRegexCache(): RegexCache {
    return this.regexCache;
  }

  getMetadataForRegion(regionCode: string|null): PhoneMetadata|null {
    return regionCode !== null ? this.source.getMetadataForRegion(regionCode) : null;
  }

  getMetadataForNonGeographicalRegion(countryCallingCode: number): PhoneMetadata|null {
    return this.source.getMetadataForNonGeographicalRegion(countryCallingCode);
  }

  // ---- Parsing ----

  /**
   * Parses a string into a phone number. The default region is used for numbers written in
   * national format, and may be null (or "ZZ") only if the number starts with a '+'.
   *
   * @throws NumberParseError if the string is not a plausible phone number.
   */
  parse(numberToParse: string|null, defaultRegion: string|null): PhoneNumber {
    return this.parser.parse(numberToParse, defaultRegion);
  }

  /** As `parse()`, also recording the raw input, calling code source and any carrier code. */
  parseAndKeepRawInput(numberToParse: string|null, defaultRegion: string|null): PhoneNumber {
    return this.parser.parseAndKeepRawInput(numberToParse, defaultRegion);
  }

  /** Splits a supported calling code off the start of a normalized number, or returns null. */
  extractCountryCode(fullNumber: string): { countryCode: number, nationalNumber: string }|null {
    return this.parser.extractCountryCode(fullNumber);
  }

  /**
   * Strips a national prefix (and any carrier code) from a national number, as done when parsing.
   */
  maybeStripNationalPrefixAndCarrierCode(number: string, metadata: PhoneMetadata): StrippedNationalPrefix {
    return this.parser.maybeStripNationalPrefixAndCarrierCode(number, metadata);
  }

  /**
   * Finds phone numbers in text. Each iteration of the result scans the text afresh, and at most
   * `maxTries` failed candidates are tried before scanning stops.
   */
  findNumbers(
      text: string|null,
      defaultRegion: string|null,
      leniency: Leniency = Leniency.VALID,
      maxTries: number = Number.MAX_SAFE_INTEGER): Iterable<PhoneNumberMatch> {
    if (maxTries < 0) {
      throw new Error(`Max tries must be >= 0: ${maxTries}`);
    }
    return {
      [Symbol.iterator]: () => new PhoneNumberMatcher(this, text ?? "", defaultRegion, leniency, maxTries),
    };
  }

  // ---- Formatting ----

  format(number: PhoneNumber, numberFormat: PhoneNumberFormat): string {
    return this.formatter.format(number, numberFormat);
  }

  formatByPattern(
      number: PhoneNumber,
      numberFormat: PhoneNumberFormat,
      userDefinedFormats: ReadonlyArray<NumberFormat>): string {
    return this.formatter.formatByPattern(number, numberFormat, userDefinedFormats);
  }

  formatNationalNumberWithCarrierCode(number: PhoneNumber, carrierCode: string): string {
    return this.formatter.formatNationalNumberWithCarrierCode(number, carrierCode);
  }

  formatNationalNumberWithPreferredCarrierCode(number: PhoneNumber, fallbackCarrierCode: string): string {
    return this.formatter.formatNationalNumberWithPreferredCarrierCode(number, fallbackCarrierCode);
  }

  formatNumberForMobileDialing(number: PhoneNumber, regionCallingFrom: string, withFormatting: boolean): string {
    return this.formatter.formatNumberForMobileDialing(number, regionCallingFrom, withFormatting);
  }

  formatOutOfCountryCallingNumber(number: PhoneNumber, regionCallingFrom: string): string {
    return this.formatter.formatOutOfCountryCallingNumber(number, regionCallingFrom);
  }

  formatOutOfCountryKeepingAlphaChars(number: PhoneNumber, regionCallingFrom: string): string {
    return this.formatter.formatOutOfCountryKeepingAlphaChars(number, regionCallingFrom);
  }

  formatInOriginalFormat(number: PhoneNumber, regionCallingFrom: string): string {
    return this.formatter.formatInOriginalFormat(number, regionCallingFrom);
  }

  chooseFormattingPatternForNumber(
      availableFormats: ReadonlyArray<NumberFormat>, nationalNumber: string): NumberFormat|null {
    return this.formatter.chooseFormattingPatternForNumber(availableFormats, nationalNumber);
  }

  /** Formats a national significant number with a single format rule (no carrier code). */
  formatNsnUsingPattern(
      nationalNumber: string, formattingPattern: NumberFormat, numberFormat: PhoneNumberFormat): string {
    return this.formatter.formatNsnUsingPattern(nationalNumber, formattingPattern, numberFormat, null);
  }

  /** Returns a new formatter for digits typed one at a time by a user in the given region. */
  getAsYouTypeFormatter(regionCode: string): AsYouTypeFormatter {
    return new AsYouTypeFormatter(this, regionCode);
  }

  // ---- Classification ----

  isValidNumber(number: PhoneNumber): boolean {
    return this.classifier.isValidNumber(number);
  }

  isValidNumberForRegion(number: PhoneNumber, regionCode: string): boolean {
    return this.classifier.isValidNumberForRegion(number, regionCode);
  }

  getNumberType(number: PhoneNumber): PhoneNumberType {
    return this.classifier.getNumberType(number);
  }

  isPossibleNumber(number: PhoneNumber): boolean {
    return this.classifier.isPossibleNumber(number);
  }

  isPossibleNumberForType(number: PhoneNumber, type: PhoneNumberType): boolean {
    return this.classifier.isPossibleNumberForType(number, type);
  }

  isPossibleNumberWithReason(number: PhoneNumber): ValidationResult {
    return this.classifier.isPossibleNumberWithReason(number);
  }

  isPossibleNumberForTypeWithReason(number: PhoneNumber, type: PhoneNumberType): ValidationResult {
    return this.classifier.isPossibleNumberForTypeWithReason(number, type);
  }

  /** Parses the string and tests whether the result is possible. Unparsable strings are not. */
  isPossibleNumberString(number: string, regionDialingFrom: string): boolean {
    try {
      return this.isPossibleNumber(this.parse(number, regionDialingFrom));
    } catch (e) {
      if (e instanceof NumberParseError) {
        return false;
      }
      throw e;
    }
  }

  canBeInternationallyDialled(number: PhoneNumber): boolean {
    return this.classifier.canBeInternationallyDialled(number);
  }

  isNumberGeographical(number: PhoneNumber): boolean {
    return this.classifier.isNumberGeographical(number);
  }

  isMobileNumberPortableRegion(regionCode: string): boolean {
    return this.classifier.isMobileNumberPortableRegion(regionCode);
  }

  getSupportedTypesForRegion(regionCode: string): ReadonlySet<PhoneNumberType> {
    return this.classifier.getSupportedTypesForRegion(regionCode);
  }

  getSupportedTypesForNonGeoEntity(countryCallingCode: number): ReadonlySet<PhoneNumberType> {
    return this.classifier.getSupportedTypesForNonGeoEntity(countryCallingCode);
  }

  /**
   * Removes digits from the end of a number until it is valid. Returns the valid number, or null
   * if it becomes too short first. A valid number is returned as it is.
   */
  truncateTooLongNumber(number: PhoneNumber): PhoneNumber|null {
    if (this.isValidNumber(number)) {
      return number;
    }
    let nationalNumber = number.getNationalNumber();
    let truncated = number;
    do {
      nationalNumber /= 10n;
      truncated = truncated.with({ nationalNumber });
      if (nationalNumber === 0n
          || this.isPossibleNumberWithReason(truncated) === ValidationResult.TOO_SHORT) {
        return null;
      }
    } while (!this.isValidNumber(truncated));
    return truncated;
  }

  // ---- Regions and calling codes ----

  getRegionCodeForNumber(number: PhoneNumber): string|null {
    return this.classifier.getRegionCodeForNumber(number);
  }

  getRegionCodeForCountryCode(countryCallingCode: number): string {
    return this.classifier.getRegionCodeForCountryCode(countryCallingCode);
  }

  getRegionCodesForCountryCode(countryCallingCode: number): ReadonlyArray<string> {
    return this.source.getRegionCodesForCountryCode(countryCallingCode);
  }

  getCountryCodeForRegion(regionCode: string|null): number {
    return this.classifier.getCountryCodeForRegion(regionCode);
  }

  getSupportedRegions(): ReadonlySet<string> {
    return this.source.getSupportedRegions();
  }

  getSupportedGlobalNetworkCallingCodes(): ReadonlySet<number> {
    return this.source.getSupportedGlobalNetworkCallingCodes();
  }

  getSupportedCallingCodes(): ReadonlySet<number> {
    return this.source.getSupportedCallingCodes();
  }

  isNANPACountry(regionCode: string|null): boolean {
    return this.classifier.isNANPACountry(regionCode);
  }

  getNddPrefixForRegion(regionCode: string|null, stripNonDigits: boolean): string|null {
    return this.classifier.getNddPrefixForRegion(regionCode, stripNonDigits);
  }

  /** Whether national numbers for the calling code can start with a zero which must be kept. */
  isLeadingZeroPossible(countryCallingCode: number): boolean {
    let metadata = this.classifier.getMetadataForRegionOrCallingCode(
        countryCallingCode, this.getRegionCodeForCountryCode(countryCallingCode));
    return metadata !== null && metadata.leadingZeroPossible;
  }

  // ---- Number structure ----

  getNationalSignificantNumber(number: PhoneNumber): string {
    return this.classifier.getNationalSignificantNumber(number);
  }

  /**
   * Returns the mobile token for a calling code (a digit which precedes the area code of mobile
   * numbers when dialled internationally, e.g. "9" for Argentina), or the empty string.
   */
  getCountryMobileToken(countryCallingCode: number): string {
    return PhoneNumberUtil.MOBILE_TOKEN_MAPPINGS.get(countryCallingCode) ?? "";
  }

  /**
   * Returns the length of the geographical area code of a number, or 0 if it has none (for
   * example non-geographical numbers, or numbers of regions without area codes).
   */
  getLengthOfGeographicalAreaCode(number: PhoneNumber): number {
    let metadata = this.getMetadataForRegion(this.getRegionCodeForNumber(number));
    if (metadata === null) {
      return 0;
    }
    // Regions without a national prefix (and without leading zeros) generally have no area codes.
    if (metadata.nationalPrefix === null && !number.isItalianLeadingZero()) {
      return 0;
    }
    let type = this.getNumberType(number);
    let countryCallingCode = number.getCountryCode();
    if (type === PhoneNumberType.MOBILE
        && PhoneNumberUtil.GEO_MOBILE_COUNTRIES_WITHOUT_MOBILE_AREA_CODES.has(countryCallingCode)) {
      return 0;
    }
    if (!NumberClassifier.isNumberTypeGeographical(type, countryCallingCode)) {
      return 0;
    }
    return this.getLengthOfNationalDestinationCode(number);
  }

  /**
   * Returns the length of the national destination code of a number (the first group of its
   * international format, plus the mobile token group for mobile numbers where one exists), or 0
   * if the international format has no separate groups.
   */
  getLengthOfNationalDestinationCode(number: PhoneNumber): number {
    let formatted = this.format(number.with({ extension: null }), PhoneNumberFormat.INTERNATIONAL);
    // The groups are "", the calling code, then the national number groups.
    let numberGroups = formatted.split(/\D+/);
    if (numberGroups.length <= 3) {
      return 0;
    }
    if (this.getNumberType(number) === PhoneNumberType.MOBILE
        && this.getCountryMobileToken(number.getCountryCode()) !== "") {
      return numberGroups[2].length + numberGroups[3].length;
    }
    return numberGroups[2].length;
  }

  // ---- Example numbers ----

  /** Returns a valid fixed-line number for the region, or null if there is none. */
  getExampleNumber(regionCode: string): PhoneNumber|null {
    return this.getExampleNumberForType(regionCode, PhoneNumberType.FIXED_LINE);
  }

  /** Returns a valid number of the given type for the region, or null if there is none. */
  getExampleNumberForType(regionCode: string, type: PhoneNumberType): PhoneNumber|null {
    let metadata = this.getMetadataForRegion(regionCode);
    if (metadata === null) {
      this.log.warn({ region: regionCode }, "invalid or unknown region code provided");
      return null;
    }
    let exampleNumber = getNumberDescByType(metadata, type).exampleNumber;
    return exampleNumber !== null ? this.parseExample(exampleNumber, regionCode) : null;
  }

  /**
   * Returns a valid number of the given type from any region or non-geographical entity, or null
   * if there is none.
   */
  getExampleNumberForAnyRegion(type: PhoneNumberType): PhoneNumber|null {
    for (let regionCode of this.getSupportedRegions()) {
      let number = this.getExampleNumberForType(regionCode, type);
      if (number !== null) {
        return number;
      }
    }
    for (let countryCallingCode of this.getSupportedGlobalNetworkCallingCodes()) {
      let metadata = this.getMetadataForNonGeographicalRegion(countryCallingCode);
      let exampleNumber = metadata !== null ? getNumberDescByType(metadata, type).exampleNumber : null;
      if (exampleNumber !== null) {
        let number = this.parseExample(`+${countryCallingCode}${exampleNumber}`, PhoneNumberUtil.UNKNOWN_REGION);
        if (number !== null) {
          return number;
        }
      }
    }
    return null;
  }

  /** Returns a valid number for a non-geographical calling code, or null if there is none. */
  getExampleNumberForNonGeoEntity(countryCallingCode: number): PhoneNumber|null {
    let metadata = this.getMetadataForNonGeographicalRegion(countryCallingCode);
    if (metadata === null) {
      this.log.warn({ callingCode: countryCallingCode }, "invalid or unknown non-geographical calling code");
      return null;
    }
    for (let type of PhoneNumberUtil.NON_GEO_EXAMPLE_TYPES) {
      let exampleNumber = getNumberDescByType(metadata, type).exampleNumber;
      if (exampleNumber !== null) {
        let number = this.parseExample(`+${countryCallingCode}${exampleNumber}`, PhoneNumberUtil.UNKNOWN_REGION);
        if (number !== null) {
          return number;
        }
      }
    }
    return null;
  }

  /**
   * Returns a number for the region which is not valid, but which is possible (or at least
   * parsable), made by shortening the region's fixed-line example number. Returns null if no
   * such number exists.
   */
  getInvalidExampleNumber(regionCode: string): PhoneNumber|null {
    let metadata = this.getMetadataForRegion(regionCode);
    if (metadata === null) {
      this.log.warn({ region: regionCode }, "invalid or unknown region code provided");
      return null;
    }
    let exampleNumber = metadata.fixedLine.exampleNumber;
    if (exampleNumber === null) {
      return null;
    }
    // Shorter numbers are less likely to be valid, so try removing digits one at a time.
    for (let length = exampleNumber.length - 1; length >= PhoneNumberNormalizer.MIN_LENGTH_FOR_NSN; length--) {
      let number = this.tryParse(exampleNumber.substring(0, length), regionCode);
      if (number !== null && !this.isValidNumber(number)) {
        return number;
      }
    }
    return null;
  }

  private parseExample(exampleNumber: string, regionCode: string): PhoneNumber|null {
    let number = this.tryParse(exampleNumber, regionCode);
    if (number === null) {
      this.log.error({ region: regionCode, exampleNumber }, "example number could not be parsed");
    }
    return number;
  }

  private tryParse(text: string, regionCode: string): PhoneNumber|null {
    try {
      return this.parse(text, regionCode);
    } catch (e) {
      if (e instanceof NumberParseError) {
        return null;
      }
      throw e;
    }
  }

  // ---- Short numbers ----

  /** Returns the short number classifier sharing this engine's metadata source and pattern cache. */
  getShortNumberInfo(): ShortNumberInfo {
    if (this.shortNumberInfo === null) {
      this.shortNumberInfo = new ShortNumberInfo(this.source, this.regexCache);
    }
    return this.shortNumberInfo;
  }

  // ---- Matching ----

  /**
   * Compares two numbers, ignoring raw input, calling code source and carrier codes.
   *
   * First number          | Second number          | Result
   * ======================+========================+=================
   *  +1 650 253 0000      |  +1 650 253 0000       | EXACT_MATCH
   * ----------------------+------------------------+-----------------
   *  +1 650 253 0000      |  650 253 0000 (no CC)  | NSN_MATCH
   * ----------------------+------------------------+-----------------
   *  +1 650 253 0000      |  +1 253 0000           | SHORT_NSN_MATCH
   * ----------------------+------------------------+-----------------
   *  +1 650 253 0000      |  +44 650 253 0000      | NO_MATCH
   *
   * Strings are parsed without a default region where possible. A string which cannot be parsed
   * gives NOT_A_NUMBER.
   */
  isNumberMatch(first: PhoneNumber|string, second: PhoneNumber|string): MatchType {
    if (typeof first === "string") {
      return typeof second === "string"
          ? this.isNumberMatchForStrings(first, second)
          : this.isNumberMatchWithString(second, first);
    }
    return typeof second === "string"
        ? this.isNumberMatchWithString(first, second)
        : this.isNumberMatchForNumbers(first, second);
  }

  private isNumberMatchForNumbers(firstNumberIn: PhoneNumber, secondNumberIn: PhoneNumber): MatchType {
    let firstNumber = PhoneNumberUtil.copyCoreFieldsOnly(firstNumberIn);
    let secondNumber = PhoneNumberUtil.copyCoreFieldsOnly(secondNumberIn);
    if (firstNumber.hasExtension() && secondNumber.hasExtension()
        && firstNumber.getExtension() !== secondNumber.getExtension()) {
      return MatchType.NO_MATCH;
    }
    let firstNumberCountryCode = firstNumber.getCountryCode();
    let secondNumberCountryCode = secondNumber.getCountryCode();
    if (firstNumberCountryCode !== 0 && secondNumberCountryCode !== 0) {
      if (firstNumber.exactlySameAs(secondNumber)) {
        return MatchType.EXACT_MATCH;
      } else if (firstNumberCountryCode === secondNumberCountryCode
          && PhoneNumberUtil.isNationalNumberSuffixOfTheOther(firstNumber, secondNumber)) {
        // One number may have been written without its area code.
        return MatchType.SHORT_NSN_MATCH;
      }
      return MatchType.NO_MATCH;
    }
    // At least one calling code is missing, so compare as if they were the same.
    firstNumber = firstNumber.with({ countryCode: secondNumberCountryCode });
    if (firstNumber.exactlySameAs(secondNumber)) {
      return MatchType.NSN_MATCH;
    }
    if (PhoneNumberUtil.isNationalNumberSuffixOfTheOther(firstNumber, secondNumber)) {
      return MatchType.SHORT_NSN_MATCH;
    }
    return MatchType.NO_MATCH;
  }

  private isNumberMatchWithString(firstNumber: PhoneNumber, secondNumber: string): MatchType {
    try {
      return this.isNumberMatchForNumbers(
          firstNumber, this.parse(secondNumber, PhoneNumberUtil.UNKNOWN_REGION));
    } catch (e) {
      if (!PhoneNumberUtil.isErrorOfType(e, ErrorType.INVALID_COUNTRY_CODE)) {
        return PhoneNumberUtil.notANumber(e);
      }
    }
    // The second number has no calling code, so parse it as if from the first number's region.
    let firstNumberRegion = this.getRegionCodeForCountryCode(firstNumber.getCountryCode());
    try {
      if (firstNumberRegion !== PhoneNumberUtil.UNKNOWN_REGION) {
        let match = this.isNumberMatchForNumbers(firstNumber, this.parse(secondNumber, firstNumberRegion));
        // The calling code of the second number was assumed, so it cannot be an exact match.
        return match === MatchType.EXACT_MATCH ? MatchType.NSN_MATCH : match;
      }
      return this.isNumberMatchForNumbers(
          firstNumber, this.parser.parseHelper(secondNumber, null, false, false));
    } catch (e) {
      return PhoneNumberUtil.notANumber(e);
    }
  }

  private isNumberMatchForStrings(firstNumber: string, secondNumber: string): MatchType {
    try {
      return this.isNumberMatchWithString(this.parse(firstNumber, PhoneNumberUtil.UNKNOWN_REGION), secondNumber);
    } catch (e) {
      if (!PhoneNumberUtil.isErrorOfType(e, ErrorType.INVALID_COUNTRY_CODE)) {
        return PhoneNumberUtil.notANumber(e);
      }
    }
    try {
      return this.isNumberMatchWithString(this.parse(secondNumber, PhoneNumberUtil.UNKNOWN_REGION), firstNumber);
    } catch (e) {
      if (!PhoneNumberUtil.isErrorOfType(e, ErrorType.INVALID_COUNTRY_CODE)) {
        return PhoneNumberUtil.notANumber(e);
      }
    }
    // Neither number has a calling code, so compare their national numbers.
    try {
      return this.isNumberMatchForNumbers(
          this.parser.parseHelper(firstNumber, null, false, false),
          this.parser.parseHelper(secondNumber, null, false, false));
    } catch (e) {
      return PhoneNumberUtil.notANumber(e);
    }
  }

  private static isErrorOfType(e: unknown, errorType: ErrorType): boolean {
    return e instanceof NumberParseError && e.errorType === errorType;
  }

  // Parse failures mean the input was not a number, anything else is rethrown.
  private static notANumber(e: unknown): MatchType {
    if (e instanceof NumberParseError) {
      return MatchType.NOT_A_NUMBER;
    }
    throw e;
  }

  private static copyCoreFieldsOnly(number: PhoneNumber): PhoneNumber {
    return PhoneNumber.of(number.getCountryCode(), number.getNationalNumber()).with({
      numberOfLeadingZeros: number.getNumberOfLeadingZeros(),
      extension: number.hasExtension() ? number.getExtension() : null,
    });
  }

  private static isNationalNumberSuffixOfTheOther(first: PhoneNumber, second: PhoneNumber): boolean {
    let firstNationalNumber = first.getNationalNumber().toString();
    let secondNationalNumber = second.getNationalNumber().toString();
    return firstNationalNumber.endsWith(secondNationalNumber)
        || secondNationalNumber.endsWith(firstNationalNumber);
  }
}
