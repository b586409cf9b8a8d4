/*~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~
 Copyright (c) 2023, David Beaumont (https://github.com/hagbard).

 This program and the accompanying materials are made available under the terms of the
 Eclipse Public License v. 2.0 available at https://www.eclipse.org/legal/epl-2.0, or the
 Apache License, Version 2.0 available at https://www.apache.org/licenses/LICENSE-2.0.

 SPDX-License-Identifier: EPL-2.0 OR Apache-2.0
 ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~*/

import { CountryCodeSource, PhoneNumber } from "./phone-number.js";
import { NumberFormat, PhoneMetadata } from "./phone-metadata.js";
import { NumberClassifier } from "./number-classifier.js";
import { PhoneNumberNormalizer } from "./phone-number-normalizer.js";
import { PhoneNumberParser } from "./phone-number-parser.js";
import { PhoneNumberType } from "./match-results.js";
import { NumberParseError } from "./number-parse-error.js";
import { Logger } from "./logger.js";

export enum PhoneNumberFormat {
  /** "+41446681800" */
  E164 = "E164",
  /** "+41 44 668 1800" */
  INTERNATIONAL = "INTERNATIONAL",
  /** "044 668 1800" */
  NATIONAL = "NATIONAL",
  /** "tel:+41-44-668-1800" */
  RFC3966 = "RFC3966",
}

/**
 * Formats phone numbers using the format rules of the region (or non-geographical entity) they
 * belong to.
 *
 * Formatting never fails. Numbers for which no format rule exists are returned with their
 * national significant number unformatted, and numbers with an unknown calling code are returned
 * as just their national significant number.
 */
export class PhoneNumberFormatter {
  private static readonly NANPA_COUNTRY_CODE: number = 1;
  private static readonly DEFAULT_EXTN_PREFIX: string = " ext. ";
  private static readonly REGION_CODE_FOR_NON_GEO_ENTITY: string = "001";
  private static readonly COLOMBIA_REGION: string = "CO";
  // Dialled before a Colombian fixed-line number when calling it from a mobile phone.
  private static readonly COLOMBIA_MOBILE_TO_FIXED_LINE_PREFIX: string = "3";
  // Brazilian numbers cannot be dialled from a mobile phone without a carrier code.
  private static readonly CARRIER_CODE_REQUIRED_REGION: string = "BR";

  // An international prefix which is a single sequence of digits, possibly with a "wait for dial
  // tone" symbol (e.g. "8~10"), can be used for formatting directly.
  private static readonly SINGLE_INTERNATIONAL_PREFIX: string = "\\d+(?:[~\u2053\u223C\uFF5E]\\d+)?";
  private static readonly FIRST_GROUP_PATTERN: RegExp = /(\$\d)/;
  private static readonly SEPARATOR_PATTERN: RegExp =
      new RegExp(`[${PhoneNumberNormalizer.VALID_PUNCTUATION}]+`, "gu");
  private static readonly LEADING_SEPARATOR_PATTERN: RegExp =
      new RegExp(`^[${PhoneNumberNormalizer.VALID_PUNCTUATION}]+`, "u");

  constructor(
      private readonly classifier: NumberClassifier,
      private readonly parser: PhoneNumberParser,
      private readonly log: Logger) {}

  /**
   * Formats a number in the given format. Extensions are appended (other than for E164), using
   * the region's preferred extension prefix or " ext. ". A number with a zero national number and
   * some raw input (e.g. an unparsable alpha number) formats as its raw input.
   */
  format(number: PhoneNumber, numberFormat: PhoneNumberFormat): string {
    let rawInput = number.getRawInput();
    if (number.getNationalNumber() === 0n && rawInput !== null && rawInput.length > 0) {
      return rawInput;
    }
    let countryCallingCode = number.getCountryCode();
    let nsn = this.classifier.getNationalSignificantNumber(number);
    if (numberFormat === PhoneNumberFormat.E164) {
      // No formatting is applied to E164 numbers, and extensions are not included.
      return PhoneNumberFormatter.prefixWithCountryCallingCode(countryCallingCode, numberFormat, nsn);
    }
    let metadata = this.getMetadataForCallingCode(countryCallingCode);
    if (metadata === null) {
      return nsn;
    }
    let formatted = this.formatNsn(nsn, metadata, numberFormat, null)
        + PhoneNumberFormatter.formattedExtension(number, metadata, numberFormat);
    return PhoneNumberFormatter.prefixWithCountryCallingCode(countryCallingCode, numberFormat, formatted);
  }

  /**
   * Formats a number using the given format rules instead of those from the metadata. National
   * prefix formatting rules in the given formats may use "$NP" (national prefix) and "$FG" (first
   * group) placeholders.
   */
  formatByPattern(
      number: PhoneNumber,
      numberFormat: PhoneNumberFormat,
      userDefinedFormats: ReadonlyArray<NumberFormat>): string {
    let countryCallingCode = number.getCountryCode();
    let nsn = this.classifier.getNationalSignificantNumber(number);
    let metadata = this.getMetadataForCallingCode(countryCallingCode);
    if (metadata === null) {
      return nsn;
    }
    let formattingPattern = this.chooseFormattingPatternForNumber(userDefinedFormats, nsn);
    let formatted: string;
    if (formattingPattern === null) {
      formatted = nsn;
    } else {
      let rule = formattingPattern.nationalPrefixFormattingRule;
      if (rule.length > 0) {
        let nationalPrefix = metadata.nationalPrefix;
        rule = nationalPrefix !== null
            ? rule.replace("$NP", () => nationalPrefix).replace("$FG", () => "$1")
            : "";
      }
      formatted = this.formatNsnUsingPattern(
          nsn, { ...formattingPattern, nationalPrefixFormattingRule: rule }, numberFormat, null);
    }
    formatted += PhoneNumberFormatter.formattedExtension(number, metadata, numberFormat);
    return PhoneNumberFormatter.prefixWithCountryCallingCode(countryCallingCode, numberFormat, formatted);
  }

  /**
   * Formats a number in national format, including the given carrier code if the matching format
   * rule has a carrier code formatting rule. An empty carrier code is ignored.
   */
  formatNationalNumberWithCarrierCode(number: PhoneNumber, carrierCode: string): string {
    let nsn = this.classifier.getNationalSignificantNumber(number);
    let metadata = this.getMetadataForCallingCode(number.getCountryCode());
    if (metadata === null) {
      return nsn;
    }
    return this.formatNsn(nsn, metadata, PhoneNumberFormat.NATIONAL, carrierCode)
        + PhoneNumberFormatter.formattedExtension(number, metadata, PhoneNumberFormat.NATIONAL);
  }

  /**
   * As `formatNationalNumberWithCarrierCode()`, using the carrier code recorded in the number
   * when it was parsed, or the fallback if there is none.
   */
  formatNationalNumberWithPreferredCarrierCode(number: PhoneNumber, fallbackCarrierCode: string): string {
    let preferred = number.getPreferredDomesticCarrierCode();
    return this.formatNationalNumberWithCarrierCode(
        number, preferred !== null && preferred.length > 0 ? preferred : fallbackCarrierCode);
  }

  /**
   * Formats a number so it can be dialled from a mobile phone in the given region. Returns the
   * empty string if the number cannot be dialled from that region. Numbers which can be dialled
   * internationally are always given in international form. Extensions are never included, and if
   * `withFormatting` is false the result is the E164 form or the digits of the national form.
   */
  formatNumberForMobileDialing(
      number: PhoneNumber, regionCallingFrom: string, withFormatting: boolean): string {
    let regionCode = this.classifier.getRegionCodeForNumber(number);
    if (regionCode === null
        || (regionCode !== PhoneNumberFormatter.REGION_CODE_FOR_NON_GEO_ENTITY
            && !this.classifier.isValidRegionCode(regionCode))) {
      return number.getRawInput() ?? "";
    }
    let formatted: string;
    let numberNoExt = number.with({ extension: null });
    let numberType = this.classifier.getNumberType(numberNoExt);
    if (regionCode === PhoneNumberFormatter.COLOMBIA_REGION
        && regionCallingFrom === PhoneNumberFormatter.COLOMBIA_REGION
        && numberType === PhoneNumberType.FIXED_LINE) {
      formatted = this.formatNationalNumberWithCarrierCode(
          numberNoExt, PhoneNumberFormatter.COLOMBIA_MOBILE_TO_FIXED_LINE_PREFIX);
    } else if (regionCode === PhoneNumberFormatter.CARRIER_CODE_REQUIRED_REGION
        && regionCallingFrom === PhoneNumberFormatter.CARRIER_CODE_REQUIRED_REGION
        && (numberType === PhoneNumberType.FIXED_LINE
            || numberType === PhoneNumberType.MOBILE
            || numberType === PhoneNumberType.FIXED_LINE_OR_MOBILE)) {
      // Most Brazilian carriers will not connect a call dialled without a carrier code.
      formatted = numberNoExt.getPreferredDomesticCarrierCode() !== null
          ? this.formatNationalNumberWithPreferredCarrierCode(numberNoExt, "")
          : "";
    } else if (this.classifier.canBeInternationallyDialled(numberNoExt)) {
      return withFormatting
          ? this.format(numberNoExt, PhoneNumberFormat.INTERNATIONAL)
          : this.format(numberNoExt, PhoneNumberFormat.E164);
    } else {
      formatted = regionCallingFrom === regionCode ? this.format(numberNoExt, PhoneNumberFormat.NATIONAL) : "";
    }
    return withFormatting ? formatted : PhoneNumberNormalizer.normalizeDigitsOnly(formatted);
  }

  /**
   * Formats a number for dialling from another region.
   *
   * Calling from                 | Result
   * =============================+=============================================================
   *  a NANPA region (for +1)     | "1 " followed by the national format
   * -----------------------------+-------------------------------------------------------------
   *  a region with the same code | the national format
   * -----------------------------+-------------------------------------------------------------
   *  any other region            | international prefix, calling code and international format
   *
   * The international prefix used is the calling region's prefix if it has a single one, or else
   * its preferred prefix. Otherwise the number is formatted with a leading '+'. An invalid calling
   * region also gives the INTERNATIONAL format.
   */
  formatOutOfCountryCallingNumber(number: PhoneNumber, regionCallingFrom: string): string {
    let metadataForRegionCallingFrom =
        this.classifier.getMetadataSource().getMetadataForRegion(regionCallingFrom);
    if (metadataForRegionCallingFrom === null) {
      this.log.warn(
          { region: regionCallingFrom },
          "formatting number from invalid region, international formatting applied");
      return this.format(number, PhoneNumberFormat.INTERNATIONAL);
    }
    let countryCallingCode = number.getCountryCode();
    let nsn = this.classifier.getNationalSignificantNumber(number);
    let metadataForRegion = this.getMetadataForCallingCode(countryCallingCode);
    if (metadataForRegion === null) {
      return nsn;
    }
    if (countryCallingCode === PhoneNumberFormatter.NANPA_COUNTRY_CODE) {
      if (this.classifier.isNANPACountry(regionCallingFrom)) {
        // For NANPA regions, return the national format with the calling code prepended.
        return `${countryCallingCode} ${this.format(number, PhoneNumberFormat.NATIONAL)}`;
      }
    } else if (countryCallingCode === metadataForRegionCallingFrom.countryCode) {
      // Regions sharing a calling code (other than NANPA) dial each other nationally.
      return this.format(number, PhoneNumberFormat.NATIONAL);
    }
    let internationalPrefixForFormatting =
        this.getInternationalPrefixForFormatting(metadataForRegionCallingFrom);
    let formatted = this.formatNsn(nsn, metadataForRegion, PhoneNumberFormat.INTERNATIONAL, null)
        + PhoneNumberFormatter.formattedExtension(number, metadataForRegion, PhoneNumberFormat.INTERNATIONAL);
    return internationalPrefixForFormatting.length > 0
        ? `${internationalPrefixForFormatting} ${countryCallingCode} ${formatted}`
        : PhoneNumberFormatter.prefixWithCountryCallingCode(
            countryCallingCode, PhoneNumberFormat.INTERNATIONAL, formatted);
  }

  /**
   * As `formatOutOfCountryCallingNumber()`, but keeps any letters in the number's raw input (e.g.
   * "1-800-FLOWERS" formats as "00 1 800-FLOWERS" when calling from GB). Grouping symbols in the
   * raw input are normalized and other punctuation is dropped. Numbers without raw input are
   * formatted as by `formatOutOfCountryCallingNumber()`.
   */
  formatOutOfCountryKeepingAlphaChars(number: PhoneNumber, regionCallingFrom: string): string {
    let rawInput = number.getRawInput();
    if (rawInput === null || rawInput.length === 0) {
      return this.formatOutOfCountryCallingNumber(number, regionCallingFrom);
    }
    let countryCode = number.getCountryCode();
    let metadataForRegion = this.getMetadataForCallingCode(countryCode);
    if (metadataForRegion === null) {
      return rawInput;
    }
    rawInput = PhoneNumberNormalizer.normalizeGroupingSymbols(rawInput);
    // Remove any prefix (e.g. a calling code or national prefix) by starting from the first
    // digits of the national number, if they can be found.
    let nationalNumber = this.classifier.getNationalSignificantNumber(number);
    if (nationalNumber.length > 3) {
      let firstNationalNumberDigit = rawInput.indexOf(nationalNumber.substring(0, 3));
      if (firstNationalNumberDigit !== -1) {
        rawInput = rawInput.substring(firstNationalNumberDigit);
      }
    }
    let metadataForRegionCallingFrom =
        this.classifier.getMetadataSource().getMetadataForRegion(regionCallingFrom);
    if (countryCode === PhoneNumberFormatter.NANPA_COUNTRY_CODE) {
      if (this.classifier.isNANPACountry(regionCallingFrom)) {
        return `${countryCode} ${rawInput}`;
      }
    } else if (metadataForRegionCallingFrom !== null
        && countryCode === metadataForRegionCallingFrom.countryCode) {
      let formattingPattern = this.chooseFormattingPatternForNumber(
          metadataForRegionCallingFrom.numberFormats, nationalNumber);
      if (formattingPattern === null) {
        return rawInput;
      }
      // Keep the raw input, but apply the national prefix formatting rule to its first digits.
      return this.formatNsnUsingPattern(
          rawInput,
          { ...formattingPattern, pattern: "(\\d+)(.*)", format: "$1$2" },
          PhoneNumberFormat.NATIONAL,
          null);
    }
    let internationalPrefixForFormatting = metadataForRegionCallingFrom !== null
        ? this.getInternationalPrefixForFormatting(metadataForRegionCallingFrom)
        : "";
    let formatted = rawInput
        + PhoneNumberFormatter.formattedExtension(number, metadataForRegion, PhoneNumberFormat.INTERNATIONAL);
    if (internationalPrefixForFormatting.length > 0) {
      return `${internationalPrefixForFormatting} ${countryCode} ${formatted}`;
    }
    if (metadataForRegionCallingFrom === null) {
      this.log.warn(
          { region: regionCallingFrom },
          "formatting number from invalid region, international formatting applied");
    }
    return PhoneNumberFormatter.prefixWithCountryCallingCode(
        countryCode, PhoneNumberFormat.INTERNATIONAL, formatted);
  }

  /**
   * Formats a number in (as far as possible) the same way it was originally entered. This needs
   * the raw input and calling code source recorded by `parseAndKeepRawInput()`; numbers without
   * them are formatted in NATIONAL format.
   *
   * The result never drops or alters a diallable character of the raw input. If the formatted
   * number differs from the raw input in its digits (or '+', '*' and '#'), the raw input is
   * returned unchanged.
   */
  formatInOriginalFormat(number: PhoneNumber, regionCallingFrom: string): string {
    let rawInput = number.getRawInput();
    if (rawInput !== null && !this.hasFormattingPatternForNumber(number)) {
      // Unformattable numbers (e.g. invalid ones) are best left exactly as entered.
      return rawInput;
    }
    let formatted: string;
    switch (number.getCountryCodeSource()) {
      case CountryCodeSource.UNSPECIFIED:
        return this.format(number, PhoneNumberFormat.NATIONAL);
      case CountryCodeSource.FROM_NUMBER_WITH_PLUS_SIGN:
        formatted = this.format(number, PhoneNumberFormat.INTERNATIONAL);
        break;
      case CountryCodeSource.FROM_NUMBER_WITH_IDD:
        formatted = this.formatOutOfCountryCallingNumber(number, regionCallingFrom);
        break;
      case CountryCodeSource.FROM_NUMBER_WITHOUT_PLUS_SIGN:
        formatted = this.format(number, PhoneNumberFormat.INTERNATIONAL).substring(1);
        break;
      case CountryCodeSource.FROM_DEFAULT_COUNTRY:
        formatted = this.formatNationalAsEntered(number, rawInput ?? "");
        break;
    }
    if (rawInput !== null && rawInput.length > 0
        && PhoneNumberNormalizer.normalizeDiallableCharsOnly(formatted)
            !== PhoneNumberNormalizer.normalizeDiallableCharsOnly(rawInput)) {
      // The formatting changed the diallable characters of the number, so use the raw input.
      formatted = rawInput;
    }
    return formatted;
  }

  // National format, but without a national prefix if the user did not enter one.
  private formatNationalAsEntered(number: PhoneNumber, rawInput: string): string {
    let regionCode = this.classifier.getRegionCodeForCountryCode(number.getCountryCode());
    let nationalPrefix = this.classifier.getNddPrefixForRegion(regionCode, true);
    let nationalFormat = this.format(number, PhoneNumberFormat.NATIONAL);
    if (nationalPrefix === null || nationalPrefix.length === 0
        || this.rawInputContainsNationalPrefix(rawInput, nationalPrefix, regionCode)) {
      return nationalFormat;
    }
    let metadata = this.classifier.getMetadataSource().getMetadataForRegion(regionCode);
    if (metadata === null) {
      return nationalFormat;
    }
    let nsn = this.classifier.getNationalSignificantNumber(number);
    let formatRule = this.chooseFormattingPatternForNumber(metadata.numberFormats, nsn);
    if (formatRule === null) {
      return nationalFormat;
    }
    // If the national prefix formatting rule adds no digits before the first group (e.g. "($1)"),
    // the national format is what the user entered.
    let indexOfFirstGroup = formatRule.nationalPrefixFormattingRule.indexOf("$1");
    if (indexOfFirstGroup <= 0) {
      return nationalFormat;
    }
    let candidateNationalPrefix = PhoneNumberNormalizer.normalizeDigitsOnly(
        formatRule.nationalPrefixFormattingRule.substring(0, indexOfFirstGroup));
    if (candidateNationalPrefix.length === 0) {
      return nationalFormat;
    }
    return this.formatByPattern(
        number, PhoneNumberFormat.NATIONAL, [{ ...formatRule, nationalPrefixFormattingRule: "" }]);
  }

  // Whether the raw input starts with the national prefix, and what follows it is a valid number.
  private rawInputContainsNationalPrefix(
      rawInput: string, nationalPrefix: string, regionCode: string): boolean {
    let normalizedNationalNumber = PhoneNumberNormalizer.normalizeDigitsOnly(rawInput);
    if (!normalizedNationalNumber.startsWith(nationalPrefix)) {
      return false;
    }
    try {
      // Some regions have numbers which start with the national prefix digit, so the remaining
      // digits must still form a valid number.
      return this.classifier.isValidNumber(this.parser.parse(
          normalizedNationalNumber.substring(nationalPrefix.length), regionCode));
    } catch (e) {
      if (e instanceof NumberParseError) {
        return false;
      }
      throw e;
    }
  }

  private hasFormattingPatternForNumber(number: PhoneNumber): boolean {
    let metadata = this.getMetadataForCallingCode(number.getCountryCode());
    if (metadata === null) {
      return false;
    }
    let nsn = this.classifier.getNationalSignificantNumber(number);
    return this.chooseFormattingPatternForNumber(metadata.numberFormats, nsn) !== null;
  }

  /**
   * Returns the first format whose most specific leading digits pattern (if any) matches the start
   * of the number, and whose pattern matches the whole number. Returns null if no format matches.
   */
  chooseFormattingPatternForNumber(
      availableFormats: ReadonlyArray<NumberFormat>, nationalNumber: string): NumberFormat|null {
    let regexCache = this.classifier.getRegexCache();
    for (let numFormat of availableFormats) {
      let size = numFormat.leadingDigitsPatterns.length;
      if (size === 0
          || regexCache.lookingAt(numFormat.leadingDigitsPatterns[size - 1], nationalNumber) !== null) {
        if (regexCache.matchesEntirely(numFormat.pattern, nationalNumber)) {
          return numFormat;
        }
      }
    }
    return null;
  }

  /**
   * Formats a national number with the given format rule. For NATIONAL format, a carrier code
   * formatting rule (if a carrier code is given) or national prefix formatting rule is applied
   * to the first group. For RFC3966, all punctuation is replaced by hyphens.
   */
  formatNsnUsingPattern(
      nationalNumber: string,
      formattingPattern: NumberFormat,
      numberFormat: PhoneNumberFormat,
      carrierCode: string|null): string {
    let numberFormatRule = formattingPattern.format;
    if (numberFormat === PhoneNumberFormat.NATIONAL
        && carrierCode !== null && carrierCode.length > 0
        && formattingPattern.domesticCarrierCodeFormattingRule.length > 0) {
      // Replace the carrier code placeholder, then use the rule in place of the first group.
      let carrierCodeFormattingRule =
          formattingPattern.domesticCarrierCodeFormattingRule.split("$CC").join(carrierCode);
      numberFormatRule =
          numberFormatRule.replace(PhoneNumberFormatter.FIRST_GROUP_PATTERN, carrierCodeFormattingRule);
    } else if (numberFormat === PhoneNumberFormat.NATIONAL
        && formattingPattern.nationalPrefixFormattingRule.length > 0) {
      numberFormatRule = numberFormatRule.replace(
          PhoneNumberFormatter.FIRST_GROUP_PATTERN, formattingPattern.nationalPrefixFormattingRule);
    }
    let formatted = this.applyFormat(nationalNumber, formattingPattern.pattern, numberFormatRule);
    if (numberFormat === PhoneNumberFormat.RFC3966) {
      formatted = formatted
          .replace(PhoneNumberFormatter.LEADING_SEPARATOR_PATTERN, "")
          .replace(PhoneNumberFormatter.SEPARATOR_PATTERN, "-");
    }
    return formatted;
  }

  // Substitutes the groups matched by the pattern into the format template.
  private applyFormat(nationalNumber: string, pattern: string, template: string): string {
    let regexCache = this.classifier.getRegexCache();
    let whole = regexCache.getPatternForRegex(`^(?:${pattern})$`);
    return whole.test(nationalNumber)
        ? nationalNumber.replace(whole, template)
        : nationalNumber.replace(regexCache.getPatternForRegex(pattern), template);
  }

  private formatNsn(
      nsn: string, metadata: PhoneMetadata, numberFormat: PhoneNumberFormat, carrierCode: string|null): string {
    // International formats are only listed where they differ from the national ones.
    let availableFormats =
        metadata.intlNumberFormats.length === 0 || numberFormat === PhoneNumberFormat.NATIONAL
            ? metadata.numberFormats
            : metadata.intlNumberFormats;
    let formattingPattern = this.chooseFormattingPatternForNumber(availableFormats, nsn);
    return formattingPattern === null
        ? nsn
        : this.formatNsnUsingPattern(nsn, formattingPattern, numberFormat, carrierCode);
  }

  private getMetadataForCallingCode(countryCallingCode: number): PhoneMetadata|null {
    if (!this.classifier.hasValidCountryCallingCode(countryCallingCode)) {
      this.log.debug({ callingCode: countryCallingCode }, "cannot format number with unknown calling code");
      return null;
    }
    let regionCode = this.classifier.getRegionCodeForCountryCode(countryCallingCode);
    return this.classifier.getMetadataForRegionOrCallingCode(countryCallingCode, regionCode);
  }

  private getInternationalPrefixForFormatting(metadata: PhoneMetadata): string {
    let internationalPrefix = metadata.internationalPrefix;
    let preferred = metadata.preferredInternationalPrefix;
    let single = internationalPrefix !== null
        && this.classifier.getRegexCache().matchesEntirely(
            PhoneNumberFormatter.SINGLE_INTERNATIONAL_PREFIX, internationalPrefix)
        ? internationalPrefix
        : null;
    return single ?? preferred ?? "";
  }

  private static formattedExtension(
      number: PhoneNumber, metadata: PhoneMetadata, numberFormat: PhoneNumberFormat): string {
    let extension = number.getExtension();
    if (extension === null || extension.length === 0) {
      return "";
    }
    if (numberFormat === PhoneNumberFormat.RFC3966) {
      return PhoneNumberNormalizer.RFC3966_EXTN_PREFIX + extension;
    }
    return (metadata.preferredExtnPrefix ?? PhoneNumberFormatter.DEFAULT_EXTN_PREFIX) + extension;
  }

  private static prefixWithCountryCallingCode(
      countryCallingCode: number, numberFormat: PhoneNumberFormat, formatted: string): string {
    switch (numberFormat) {
      case PhoneNumberFormat.E164:
        return `+${countryCallingCode}${formatted}`;
      case PhoneNumberFormat.INTERNATIONAL:
        return `+${countryCallingCode} ${formatted}`;
      case PhoneNumberFormat.RFC3966:
        return `tel:+${countryCallingCode}-${formatted}`;
      case PhoneNumberFormat.NATIONAL:
        return formatted;
    }
  }
}
