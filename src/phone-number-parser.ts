/*~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~
 Copyright (c) 2023, David Beaumont (https://github.com/hagbard).

 This program and the accompanying materials are made available under the terms of the
 Eclipse Public License v. 2.0 available at https://www.eclipse.org/legal/epl-2.0, or the
 Apache License, Version 2.0 available at https://www.apache.org/licenses/LICENSE-2.0.

 SPDX-License-Identifier: EPL-2.0 OR Apache-2.0
 ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~*/

import { CountryCodeSource, PhoneNumber } from "./phone-number.js";
import { ErrorType, NumberParseError } from "./number-parse-error.js";
import { PhoneMetadata } from "./phone-metadata.js";
import { NumberClassifier } from "./number-classifier.js";
import { PhoneNumberNormalizer } from "./phone-number-normalizer.js";
import { ValidationResult } from "./match-results.js";
import { Logger } from "./logger.js";

/** The result of stripping a national prefix (and possibly a carrier code) from a number. */
export interface StrippedNationalPrefix {
  /** The national number, after any national prefix was removed or transformed. */
  readonly number: string;
  /** Any carrier code found in the national prefix, or null. */
  readonly carrierCode: string|null;
  /** Whether a national prefix was stripped. */
  readonly stripped: boolean;
}

/** The result of extracting a country calling code from the start of a number. */
export interface ExtractedCountryCode {
  /** The calling code found, or 0 if none was found. */
  readonly countryCode: number;
  /** The normalized digits after the calling code (empty if no calling code was found). */
  readonly nationalNumber: string;
  readonly source: CountryCodeSource;
}

/**
 * Parses phone number text into `PhoneNumber` instances.
 *
 * Parsing accepts almost any human formatted number: national and international formats, vanity
 * numbers (e.g. "1-800-FLOWERS"), extensions (e.g. "ext. 1234" or "x1234"), full-width and other
 * non-ASCII digits, and RFC3966 "tel:" URIs.
 *
 * The country calling code of a number is determined as follows (the "source" is recorded when
 * raw input is kept):
 *
 * Input (default region "US") ||  Source                        | Calling code
 * ============================||================================+==============
 *  "+44 20 7031 3000"         ||  FROM_NUMBER_WITH_PLUS_SIGN    |  44
 * ----------------------------||--------------------------------+--------------
 *  "011 44 20 7031 3000"      ||  FROM_NUMBER_WITH_IDD          |  44
 * ----------------------------||--------------------------------+--------------
 *  "1 650 253 0000"           ||  FROM_NUMBER_WITHOUT_PLUS_SIGN |  1
 * ----------------------------||--------------------------------+--------------
 *  "(650) 253-0000"           ||  FROM_DEFAULT_COUNTRY          |  1
 *
 * In the third case, the leading "1" is only treated as the calling code if the remaining digits
 * look more like a valid national number than the complete input does (or if the complete input
 * is too long to be a national number).
 *
 * Once the calling code is known, any national prefix (e.g. the leading "0" in "020 7031 3000")
 * is removed, along with any carrier selection code it contains.
 */
export class PhoneNumberParser {
  private static readonly PLUS_CHARS_PATTERN: RegExp =
      new RegExp(`^[${PhoneNumberNormalizer.PLUS_CHARS}]+`, "u");
  private static readonly CAPTURING_DIGIT_PATTERN: RegExp =
      new RegExp(`(${PhoneNumberNormalizer.DIGITS})`, "u");
  // Never matches a normalized number, used when no international prefix is known.
  private static readonly NON_MATCHING_IDD_PREFIX: string = "NonMatch";

  constructor(private readonly classifier: NumberClassifier, private readonly log: Logger) {}

  /**
   * Parses a string into a phone number.
   *
   * The default region is used when the number is not written in international format (with a
   * leading '+' or the region's international dialling prefix). It may be null only if the
   * number starts with a '+'.
   *
   * The returned number need not be valid, only plausible (e.g. of a reasonable length). Use
   * `PhoneNumberUtil.isValidNumber()` to check validity.
   *
   * @throws NumberParseError if the text cannot be interpreted as a phone number.
   */
  parse(text: string|null, defaultRegion: string|null): PhoneNumber {
    return this.parseHelper(text, defaultRegion, false, true);
  }

  /**
   * As `parse()`, but the returned number also records the raw input, the source of the calling
   * code and any carrier code, so that it can later be formatted in its original format.
   */
  parseAndKeepRawInput(text: string|null, defaultRegion: string|null): PhoneNumber {
    return this.parseHelper(text, defaultRegion, true, true);
  }

  /**
   * Parses a number, optionally without requiring a valid default region for national numbers
   * (in which case the returned number may have a calling code of zero).
   */
  parseHelper(
      text: string|null,
      defaultRegion: string|null,
      keepRawInput: boolean,
      checkRegion: boolean): PhoneNumber {
    if (text === null) {
      throw new NumberParseError(ErrorType.NOT_A_NUMBER, "The phone number supplied was null.");
    } else if (text.length > PhoneNumberNormalizer.MAX_INPUT_STRING_LENGTH) {
      throw new NumberParseError(ErrorType.TOO_LONG, "The string supplied was too long to parse.");
    }
    let nationalNumber = PhoneNumberParser.buildNationalNumberForParsing(text);
    if (!PhoneNumberNormalizer.isViablePhoneNumber(nationalNumber)) {
      throw new NumberParseError(
          ErrorType.NOT_A_NUMBER, "The string supplied did not seem to be a phone number.");
    }
    // The region is only needed if the number is not written with a leading plus sign.
    if (checkRegion && !this.checkRegionForParsing(nationalNumber, defaultRegion)) {
      throw new NumberParseError(ErrorType.INVALID_COUNTRY_CODE, "Missing or invalid default region.");
    }

    let { number: numberWithoutExtension, extension } =
        PhoneNumberNormalizer.maybeStripExtension(nationalNumber);
    let regionMetadata = defaultRegion !== null
        ? this.classifier.getMetadataSource().getMetadataForRegion(defaultRegion)
        : null;

    let extracted: ExtractedCountryCode;
    try {
      extracted = this.maybeExtractCountryCode(numberWithoutExtension, regionMetadata);
    } catch (e) {
      let plus = PhoneNumberParser.PLUS_CHARS_PATTERN.exec(numberWithoutExtension);
      if (e instanceof NumberParseError
          && e.errorType === ErrorType.INVALID_COUNTRY_CODE
          && plus !== null) {
        // Try again without the plus sign, in case it was mistyped before an IDD or national number.
        extracted = this.maybeExtractCountryCode(
            numberWithoutExtension.substring(plus[0].length), regionMetadata);
        if (extracted.countryCode === 0) {
          throw new NumberParseError(
              ErrorType.INVALID_COUNTRY_CODE, "Could not interpret numbers after plus-sign.");
        }
      } else {
        throw e;
      }
    }

    let countryCode = extracted.countryCode;
    let countryCodeSource = extracted.source;
    let normalizedNationalNumber = extracted.nationalNumber;
    if (countryCode !== 0) {
      let phoneNumberRegion = this.classifier.getRegionCodeForCountryCode(countryCode);
      if (phoneNumberRegion !== defaultRegion) {
        regionMetadata =
            this.classifier.getMetadataForRegionOrCallingCode(countryCode, phoneNumberRegion);
      }
    } else {
      normalizedNationalNumber = PhoneNumberNormalizer.normalize(numberWithoutExtension);
      if (regionMetadata !== null) {
        countryCode = regionMetadata.countryCode;
      } else {
        countryCodeSource = CountryCodeSource.UNSPECIFIED;
      }
    }
    if (normalizedNationalNumber.length < PhoneNumberNormalizer.MIN_LENGTH_FOR_NSN) {
      throw new NumberParseError(
          ErrorType.TOO_SHORT_NSN, "The string supplied is too short to be a phone number.");
    }

    let carrierCode: string|null = null;
    if (regionMetadata !== null) {
      let potential =
          this.maybeStripNationalPrefixAndCarrierCode(normalizedNationalNumber, regionMetadata);
      let validationResult = this.classifier.testNumberLength(potential.number, regionMetadata);
      // Only keep the stripped number if it is not obviously the wrong length, since a leading
      // digit may be part of the number rather than a national prefix.
      if (validationResult !== ValidationResult.TOO_SHORT
          && validationResult !== ValidationResult.IS_POSSIBLE_LOCAL_ONLY
          && validationResult !== ValidationResult.INVALID_LENGTH) {
        normalizedNationalNumber = potential.number;
        carrierCode = potential.carrierCode;
      }
    }

    let lengthOfNationalNumber = normalizedNationalNumber.length;
    if (lengthOfNationalNumber < PhoneNumberNormalizer.MIN_LENGTH_FOR_NSN) {
      throw new NumberParseError(
          ErrorType.TOO_SHORT_NSN, "The string supplied is too short to be a phone number.");
    }
    if (lengthOfNationalNumber > PhoneNumberNormalizer.MAX_LENGTH_FOR_NSN) {
      throw new NumberParseError(
          ErrorType.TOO_LONG, "The string supplied is too long to be a phone number.");
    }

    let number = PhoneNumber.fromNationalSignificantNumber(countryCode, normalizedNationalNumber)
        .with({ extension });
    if (keepRawInput) {
      number = number.with({
        rawInput: text,
        countryCodeSource,
        preferredDomesticCarrierCode: carrierCode !== null && carrierCode.length > 0 ? carrierCode : null,
      });
    }
    this.log.trace({ number: number.toString() }, "parsed phone number");
    return number;
  }

  // The region is only needed for numbers which do not start with a plus sign.
  private checkRegionForParsing(number: string, defaultRegion: string|null): boolean {
    return this.classifier.isValidRegionCode(defaultRegion)
        || PhoneNumberParser.PLUS_CHARS_PATTERN.test(number);
  }

  /**
   * Extracts the part of the input to parse. For RFC3966 URIs ("tel:...") a global
   * "phone-context" (starting with '+') is prepended to the number, and parameters other than
   * the extension are removed. Other input has non-number text removed from either end.
   */
  static buildNationalNumberForParsing(text: string): string {
    let nationalNumber = "";
    let indexOfPhoneContext = text.indexOf(PhoneNumberNormalizer.RFC3966_PHONE_CONTEXT);
    if (indexOfPhoneContext >= 0) {
      let phoneContextStart = indexOfPhoneContext + PhoneNumberNormalizer.RFC3966_PHONE_CONTEXT.length;
      // Only a global phone context (starting with '+') adds information.
      if (phoneContextStart < text.length - 1
          && text.charAt(phoneContextStart) === PhoneNumberNormalizer.PLUS_SIGN) {
        let phoneContextEnd = text.indexOf(";", phoneContextStart);
        nationalNumber += phoneContextEnd > 0
            ? text.substring(phoneContextStart, phoneContextEnd)
            : text.substring(phoneContextStart);
      }
      let indexOfRfc3966Prefix = text.indexOf(PhoneNumberNormalizer.RFC3966_PREFIX);
      let indexOfNationalNumber = indexOfRfc3966Prefix >= 0
          ? indexOfRfc3966Prefix + PhoneNumberNormalizer.RFC3966_PREFIX.length
          : 0;
      nationalNumber += text.substring(indexOfNationalNumber, indexOfPhoneContext);
    } else {
      nationalNumber = PhoneNumberNormalizer.extractPossibleNumber(text);
    }
    let indexOfIsdn = nationalNumber.indexOf(PhoneNumberNormalizer.RFC3966_ISDN_SUBADDRESS);
    if (indexOfIsdn > 0) {
      nationalNumber = nationalNumber.substring(0, indexOfIsdn);
    }
    return nationalNumber;
  }

  /**
   * Tries to extract a calling code from the start of a number (which must not contain an
   * extension).
   *
   * If the number starts with a plus sign or the default region's international dialling prefix,
   * the calling code must follow it, or parsing fails. Otherwise, if the number starts with the
   * default region's own calling code, and removing it leaves a more plausible national number,
   * that calling code is returned. Otherwise the calling code is 0 and the national number is
   * empty.
   *
   * @throws NumberParseError if a calling code was expected but not found.
   */
  maybeExtractCountryCode(number: string, defaultRegionMetadata: PhoneMetadata|null): ExtractedCountryCode {
    if (number.length === 0) {
      return { countryCode: 0, nationalNumber: "", source: CountryCodeSource.FROM_DEFAULT_COUNTRY };
    }
    let possibleIddPrefix = defaultRegionMetadata?.internationalPrefix
        ?? PhoneNumberParser.NON_MATCHING_IDD_PREFIX;
    let { number: fullNumber, source } =
        this.maybeStripInternationalPrefixAndNormalize(number, possibleIddPrefix);
    if (source !== CountryCodeSource.FROM_DEFAULT_COUNTRY) {
      // Exactly MIN_LENGTH_FOR_NSN digits may still hold a calling code, so they are not rejected
      // here (they fail later as TOO_SHORT_NSN if nothing remains after the calling code).
      if (fullNumber.length < PhoneNumberNormalizer.MIN_LENGTH_FOR_NSN) {
        throw new NumberParseError(
            ErrorType.TOO_SHORT_AFTER_IDD,
            "Phone number had an IDD, but after this was not long enough to be a viable phone number.");
      }
      let extracted = this.extractCountryCode(fullNumber);
      if (extracted !== null) {
        return { ...extracted, source };
      }
      throw new NumberParseError(
          ErrorType.INVALID_COUNTRY_CODE, "Country calling code supplied was not recognised.");
    } else if (defaultRegionMetadata !== null) {
      // Check whether the number starts with the default region's calling code, without a plus.
      let defaultCountryCode = defaultRegionMetadata.countryCode;
      let defaultCountryCodeString = String(defaultCountryCode);
      if (fullNumber.startsWith(defaultCountryCodeString)) {
        let potential = this.maybeStripNationalPrefixAndCarrierCode(
            fullNumber.substring(defaultCountryCodeString.length), defaultRegionMetadata).number;
        let generalDesc = defaultRegionMetadata.generalDesc;
        // Accept the calling code if the number was not valid before and is now, or if the
        // number was too long to be a national number to begin with.
        if ((!this.classifier.matchesNationalNumberPattern(fullNumber, generalDesc)
                && this.classifier.matchesNationalNumberPattern(potential, generalDesc))
            || this.classifier.testNumberLength(fullNumber, defaultRegionMetadata)
                === ValidationResult.TOO_LONG) {
          return {
            countryCode: defaultCountryCode,
            nationalNumber: potential,
            source: CountryCodeSource.FROM_NUMBER_WITHOUT_PLUS_SIGN,
          };
        }
      }
    }
    return { countryCode: 0, nationalNumber: "", source };
  }

  /**
   * Strips a leading plus sign, or the given international dialling prefix, from a number and
   * normalizes what remains. The prefix is only stripped if the digit after it is not a zero
   * (calling codes never start with zero).
   */
  maybeStripInternationalPrefixAndNormalize(
      number: string, possibleIddPrefix: string): { number: string, source: CountryCodeSource } {
    if (number.length === 0) {
      return { number, source: CountryCodeSource.FROM_DEFAULT_COUNTRY };
    }
    let plus = PhoneNumberParser.PLUS_CHARS_PATTERN.exec(number);
    if (plus !== null) {
      return {
        number: PhoneNumberNormalizer.normalize(number.substring(plus[0].length)),
        source: CountryCodeSource.FROM_NUMBER_WITH_PLUS_SIGN,
      };
    }
    let normalized = PhoneNumberNormalizer.normalize(number);
    let idd = this.classifier.getRegexCache().lookingAt(possibleIddPrefix, normalized);
    if (idd !== null) {
      let remainder = normalized.substring(idd[0].length);
      // A zero after the prefix means it was not really an IDD (calling codes never start with 0).
      let firstDigit = PhoneNumberParser.CAPTURING_DIGIT_PATTERN.exec(remainder);
      if (firstDigit === null || PhoneNumberNormalizer.normalizeDigitsOnly(firstDigit[1]) !== "0") {
        return { number: remainder, source: CountryCodeSource.FROM_NUMBER_WITH_IDD };
      }
    }
    return { number: normalized, source: CountryCodeSource.FROM_DEFAULT_COUNTRY };
  }

  /**
   * Extracts a supported calling code from the start of a normalized number, trying the shortest
   * (one digit) codes first. Returns null if no calling code is found.
   */
  extractCountryCode(fullNumber: string): { countryCode: number, nationalNumber: string }|null {
    if (fullNumber.length === 0 || fullNumber.charAt(0) === "0") {
      // Calling codes never start with 0.
      return null;
    }
    for (let i = 1; i <= PhoneNumberNormalizer.MAX_LENGTH_COUNTRY_CODE && i <= fullNumber.length; i++) {
      let potentialCountryCode = parseInt(fullNumber.substring(0, i), 10);
      if (this.classifier.hasValidCountryCallingCode(potentialCountryCode)) {
        return { countryCode: potentialCountryCode, nationalNumber: fullNumber.substring(i) };
      }
    }
    return null;
  }

  /**
   * Strips a national prefix (and any carrier code it contains) from the start of a national
   * number, or rewrites it according to the region's transform rule.
   *
   * The prefix is not stripped if the number matched the region's general pattern before
   * stripping but would not match after it.
   */
  maybeStripNationalPrefixAndCarrierCode(number: string, metadata: PhoneMetadata): StrippedNationalPrefix {
    let unchanged: StrippedNationalPrefix = { number, carrierCode: null, stripped: false };
    let possibleNationalPrefix = metadata.nationalPrefixForParsing;
    if (number.length === 0 || possibleNationalPrefix === null) {
      return unchanged;
    }
    let regexCache = this.classifier.getRegexCache();
    let prefixMatch = regexCache.lookingAt(possibleNationalPrefix, number);
    if (prefixMatch === null) {
      return unchanged;
    }
    let generalDesc = metadata.generalDesc;
    let isViableOriginalNumber = this.classifier.matchesNationalNumberPattern(number, generalDesc);
    // The transform rule refers to groups positionally, so the last group decides whether a
    // transform applies at all.
    let numOfGroups = prefixMatch.length - 1;
    let transformRule = metadata.nationalPrefixTransformRule;
    if (transformRule === null || prefixMatch[numOfGroups] === undefined) {
      let remainder = number.substring(prefixMatch[0].length);
      if (isViableOriginalNumber
          && !this.classifier.matchesNationalNumberPattern(remainder, generalDesc)) {
        return unchanged;
      }
      let carrierCode = numOfGroups > 0 && prefixMatch[numOfGroups] !== undefined
          ? prefixMatch[1] ?? null
          : null;
      return { number: remainder, carrierCode, stripped: true };
    }
    let transformed = number.replace(
        regexCache.getPatternForRegex(`^(?:${possibleNationalPrefix})`), transformRule);
    if (isViableOriginalNumber
        && !this.classifier.matchesNationalNumberPattern(transformed, generalDesc)) {
      return unchanged;
    }
    let carrierCode = numOfGroups > 1 ? prefixMatch[1] ?? null : null;
    return { number: transformed, carrierCode, stripped: true };
  }
}
