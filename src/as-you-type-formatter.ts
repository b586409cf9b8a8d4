/*~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~
 Copyright (c) 2023, David Beaumont (https://github.com/hagbard).

 This program and the accompanying materials are made available under the terms of the
 Eclipse Public License v. 2.0 available at https://www.eclipse.org/legal/epl-2.0, or the
 Apache License, Version 2.0 available at https://www.apache.org/licenses/LICENSE-2.0.

 SPDX-License-Identifier: EPL-2.0 OR Apache-2.0
 ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~*/

import type { PhoneNumberUtil } from "./phone-number-util.js";
import { NumberFormat, PhoneMetadata } from "./phone-metadata.js";
import { NumberClassifier } from "./number-classifier.js";
import { PhoneNumberNormalizer } from "./phone-number-normalizer.js";
import { RegexCache } from "./regex-cache.js";

/**
 * Formats a phone number as it is typed, one character at a time.
 *
 * Each call to `inputDigit()` returns the partially formatted number so far. Formatting follows
 * the number formats of the region (switching region once a calling code is typed after an IDD or
 * plus sign). As soon as the user types a formatting character of their own, the input is
 * returned as typed from then on.
 *
 * ```
 * let formatter = util.getAsYouTypeFormatter("US");
 * for (let c of "6502530000") {
 *   formatter.inputDigit(c);  // ... "650-2530", "(650) 253-00", ...
 * }
 * formatter.clear();
 * ```
 *
 * Instances hold the state of a single number being entered and are not shared between users.
 */
export class AsYouTypeFormatter {
  private static readonly SEPARATOR_BEFORE_NATIONAL_NUMBER = " ";
  private static readonly MIN_LEADING_DIGITS_LENGTH = 3;
  // Stands in for a digit still to be typed in a formatting template.
  private static readonly DIGIT_PLACEHOLDER = "\u2008";
  // Matched against a number pattern to get the longest example for a template.
  private static readonly LONGEST_PHONE_NUMBER = "999999999999999";
  private static readonly CHARACTER_CLASS_PATTERN: RegExp = /\[([^\[\]])*\]/g;
  // A digit which is not part of a "{n,m}" quantifier.
  private static readonly STANDALONE_DIGIT_PATTERN: RegExp = /\d(?=[^,}][^,}])/g;
  // Format strings made only of groups and punctuation can be turned into templates.
  private static readonly ELIGIBLE_FORMAT_PATTERN: string =
      `[${PhoneNumberNormalizer.VALID_PUNCTUATION}]*`
      + `(?:\\$\\d[${PhoneNumberNormalizer.VALID_PUNCTUATION}]*)+`;
  private static readonly NATIONAL_PREFIX_SEPARATORS_PATTERN: RegExp = /[- ]/;
  private static readonly FIRST_GROUP_ONLY_PREFIX_PATTERN: string = "\\(?\\$1\\)?";

  private readonly regexCache: RegexCache;
  private readonly defaultMetadata: PhoneMetadata|null;
  private currentMetadata: PhoneMetadata|null;

  private currentOutput: string = "";
  private formattingTemplate: string = "";
  // The pattern from which the current template was made.
  private currentFormattingPattern: string = "";
  private accruedInput: string = "";
  private accruedInputWithoutFormatting: string = "";
  private ableToFormat: boolean = true;
  // Set when the user typed a formatting character; the input is then returned as typed.
  private inputHasFormatting: boolean = false;
  // Set once an IDD, plus sign or national prefix is seen.
  private isCompleteNumber: boolean = false;
  private isExpectingCountryCallingCode: boolean = false;
  private shouldAddSpaceAfterNationalPrefix: boolean = false;
  private lastMatchPosition: number = 0;
  // Position in the accrued input, used when formatting was given up.
  private originalPosition: number = 0;
  // Position in the accrued digits, used while formatting.
  private positionToRemember: number = 0;
  private prefixBeforeNationalNumber: string = "";
  private extractedNationalPrefix: string = "";
  private nationalNumber: string = "";
  private possibleFormats: NumberFormat[] = [];

  constructor(private readonly util: PhoneNumberUtil, private readonly defaultRegion: string) {
    this.regexCache = util.getRegexCache();
    this.defaultMetadata = this.getMetadataForRegion(defaultRegion);
    this.currentMetadata = this.defaultMetadata;
  }

  /** Resets the formatter, so that it can be used for a new number. */
  clear(): void {
    this.currentOutput = "";
    this.accruedInput = "";
    this.accruedInputWithoutFormatting = "";
    this.formattingTemplate = "";
    this.lastMatchPosition = 0;
    this.currentFormattingPattern = "";
    this.prefixBeforeNationalNumber = "";
    this.extractedNationalPrefix = "";
    this.nationalNumber = "";
    this.ableToFormat = true;
    this.inputHasFormatting = false;
    this.positionToRemember = 0;
    this.originalPosition = 0;
    this.isCompleteNumber = false;
    this.isExpectingCountryCallingCode = false;
    this.possibleFormats = [];
    this.shouldAddSpaceAfterNationalPrefix = false;
    this.currentMetadata = this.defaultMetadata;
  }

  /**
   * Adds the next character typed and returns the number formatted so far. Non-ASCII decimal
   * digits are accepted and shown as ASCII digits.
   */
  inputDigit(nextChar: string): string {
    this.currentOutput = this.inputDigitWithOptionToRememberPosition(nextChar, false);
    return this.currentOutput;
  }

  /**
   * As `inputDigit()`, but remembers where this character is, so that `getRememberedPosition()`
   * can report its position in later outputs.
   */
  inputDigitAndRememberPosition(nextChar: string): string {
    this.currentOutput = this.inputDigitWithOptionToRememberPosition(nextChar, true);
    return this.currentOutput;
  }

  /** The position just after the remembered character, in the current output. */
  getRememberedPosition(): number {
    if (!this.ableToFormat) {
      return this.originalPosition;
    }
    let accruedInputIndex = 0;
    let currentOutputIndex = 0;
    while (accruedInputIndex < this.positionToRemember && currentOutputIndex < this.currentOutput.length) {
      if (this.accruedInputWithoutFormatting.charAt(accruedInputIndex)
          === this.currentOutput.charAt(currentOutputIndex)) {
        accruedInputIndex++;
      }
      currentOutputIndex++;
    }
    return currentOutputIndex;
  }

  private getMetadataForRegion(regionCode: string): PhoneMetadata|null {
    let countryCallingCode = this.util.getCountryCodeForRegion(regionCode);
    let mainCountry = this.util.getRegionCodeForCountryCode(countryCallingCode);
    return this.util.getMetadataForRegion(mainCountry);
  }

  private inputDigitWithOptionToRememberPosition(nextChar: string, rememberPosition: boolean): string {
    let isLeadingChar = this.accruedInput.length === 0;
    this.accruedInput += nextChar;
    if (rememberPosition) {
      this.originalPosition = this.accruedInput.length;
    }
    if (!this.isDigitOrLeadingPlusSign(nextChar, isLeadingChar)) {
      this.ableToFormat = false;
      this.inputHasFormatting = true;
    } else {
      nextChar = this.normalizeAndAccrueDigitsAndPlusSign(nextChar, rememberPosition);
    }
    if (!this.ableToFormat) {
      if (this.inputHasFormatting) {
        return this.accruedInput;
      }
      if (this.attemptToExtractIdd()) {
        if (this.attemptToExtractCountryCallingCode()) {
          return this.attemptToChoosePatternWithPrefixExtracted();
        }
      } else if (this.ableToExtractLongerNdd()) {
        // A longer national prefix may make the number formattable again.
        this.prefixBeforeNationalNumber += AsYouTypeFormatter.SEPARATOR_BEFORE_NATIONAL_NUMBER;
        return this.attemptToChoosePatternWithPrefixExtracted();
      }
      return this.accruedInput;
    }

    let digitCount = this.accruedInputWithoutFormatting.length;
    if (digitCount < 3) {
      return this.accruedInput;
    }
    if (digitCount === 3) {
      if (this.attemptToExtractIdd()) {
        this.isExpectingCountryCallingCode = true;
      } else {
        // No IDD or plus sign, so the number may be in national format.
        this.extractedNationalPrefix = this.removeNationalPrefixFromNationalNumber();
        return this.attemptToChooseFormattingPattern();
      }
    }
    if (this.isExpectingCountryCallingCode) {
      if (this.attemptToExtractCountryCallingCode()) {
        this.isExpectingCountryCallingCode = false;
      }
      return this.prefixBeforeNationalNumber + this.nationalNumber;
    }
    if (this.possibleFormats.length === 0) {
      return this.attemptToChooseFormattingPattern();
    }
    // A template is already chosen.
    let tempNationalNumber = this.inputDigitHelper(nextChar);
    let formattedNumber = this.attemptToFormatAccruedDigits();
    if (formattedNumber.length > 0) {
      return formattedNumber;
    }
    this.narrowDownPossibleFormats(this.nationalNumber);
    if (this.maybeCreateNewTemplate()) {
      return this.inputAccruedNationalNumber();
    }
    return this.ableToFormat ? this.appendNationalNumber(tempNationalNumber) : this.accruedInput;
  }

  private isDigitOrLeadingPlusSign(c: string, isLeadingChar: boolean): boolean {
    return PhoneNumberNormalizer.digitValue(c) >= 0
        || (isLeadingChar && c.length === 1 && PhoneNumberNormalizer.PLUS_CHARS.includes(c));
  }

  // Returns the ASCII form of the character, which is either a digit or '+'.
  private normalizeAndAccrueDigitsAndPlusSign(nextChar: string, rememberPosition: boolean): string {
    let normalizedChar: string;
    let digit = PhoneNumberNormalizer.digitValue(nextChar);
    if (digit < 0) {
      normalizedChar = "+";
      this.accruedInputWithoutFormatting += normalizedChar;
    } else {
      normalizedChar = String(digit);
      this.accruedInputWithoutFormatting += normalizedChar;
      this.nationalNumber += normalizedChar;
    }
    if (rememberPosition) {
      this.positionToRemember = this.accruedInputWithoutFormatting.length;
    }
    return normalizedChar;
  }

  private attemptToChoosePatternWithPrefixExtracted(): string {
    this.ableToFormat = true;
    this.isExpectingCountryCallingCode = false;
    this.possibleFormats = [];
    this.lastMatchPosition = 0;
    this.formattingTemplate = "";
    this.currentFormattingPattern = "";
    return this.attemptToChooseFormattingPattern();
  }

  private attemptToChooseFormattingPattern(): string {
    if (this.nationalNumber.length < AsYouTypeFormatter.MIN_LEADING_DIGITS_LENGTH) {
      return this.appendNationalNumber(this.nationalNumber);
    }
    this.getAvailableFormats(this.nationalNumber);
    let formattedNumber = this.attemptToFormatAccruedDigits();
    if (formattedNumber.length > 0) {
      return formattedNumber;
    }
    return this.maybeCreateNewTemplate() ? this.inputAccruedNationalNumber() : this.accruedInput;
  }

  private getAvailableFormats(leadingDigits: string): void {
    let metadata = this.currentMetadata;
    if (metadata === null) {
      return;
    }
    let formatList = this.isCompleteNumber && metadata.intlNumberFormats.length > 0
        ? metadata.intlNumberFormats
        : metadata.numberFormats;
    let nationalPrefixIsUsedByCountry = (metadata.nationalPrefix ?? "").length > 0;
    for (let format of formatList) {
      // Formats which need a national prefix that was not typed are skipped.
      if (nationalPrefixIsUsedByCountry
          && !this.isCompleteNumber
          && !format.nationalPrefixOptionalWhenFormatting
          && !this.formattingRuleHasFirstGroupOnly(format.nationalPrefixFormattingRule)) {
        continue;
      }
      if (this.regexCache.matchesEntirely(AsYouTypeFormatter.ELIGIBLE_FORMAT_PATTERN, format.format)) {
        this.possibleFormats.push(format);
      }
    }
    this.narrowDownPossibleFormats(leadingDigits);
  }

  private formattingRuleHasFirstGroupOnly(nationalPrefixFormattingRule: string): boolean {
    return nationalPrefixFormattingRule.length === 0
        || this.regexCache.matchesEntirely(
            AsYouTypeFormatter.FIRST_GROUP_ONLY_PREFIX_PATTERN, nationalPrefixFormattingRule);
  }

  // Leading digits patterns get more specific with each digit from the third onwards.
  private narrowDownPossibleFormats(leadingDigits: string): void {
    let indexOfLeadingDigitsPattern =
        Math.max(0, leadingDigits.length - AsYouTypeFormatter.MIN_LEADING_DIGITS_LENGTH);
    this.possibleFormats = this.possibleFormats.filter(format => {
      let patterns = format.leadingDigitsPatterns;
      if (patterns.length === 0) {
        return true;
      }
      let pattern = patterns[Math.min(indexOfLeadingDigitsPattern, patterns.length - 1)];
      return this.regexCache.lookingAt(pattern, leadingDigits) !== null;
    });
  }

  private attemptToFormatAccruedDigits(): string {
    for (let numberFormat of this.possibleFormats) {
      if (this.regexCache.matchesEntirely(numberFormat.pattern, this.nationalNumber)) {
        this.shouldAddSpaceAfterNationalPrefix = AsYouTypeFormatter.NATIONAL_PREFIX_SEPARATORS_PATTERN
            .test(numberFormat.nationalPrefixFormattingRule);
        let formattedNumber = this.nationalNumber.replace(
            this.regexCache.getPatternForRegex(`^(?:${numberFormat.pattern})$`), numberFormat.format);
        return this.appendNationalNumber(formattedNumber);
      }
    }
    return "";
  }

  // Makes a template from the first possible format that gives one, dropping formats that don't.
  private maybeCreateNewTemplate(): boolean {
    for (;;) {
      let numberFormat = this.possibleFormats[0];
      if (numberFormat === undefined) {
        break;
      }
      if (this.currentFormattingPattern === numberFormat.pattern) {
        return false;
      }
      if (this.createFormattingTemplate(numberFormat)) {
        this.currentFormattingPattern = numberFormat.pattern;
        this.shouldAddSpaceAfterNationalPrefix = AsYouTypeFormatter.NATIONAL_PREFIX_SEPARATORS_PATTERN
            .test(numberFormat.nationalPrefixFormattingRule);
        this.lastMatchPosition = 0;
        return true;
      }
      this.possibleFormats.shift();
    }
    this.ableToFormat = false;
    return false;
  }

  private createFormattingTemplate(format: NumberFormat): boolean {
    let numberPattern = format.pattern;
    // Alternations cannot be turned into a single template.
    if (numberPattern.includes("|")) {
      return false;
    }
    numberPattern = numberPattern
        .replace(AsYouTypeFormatter.CHARACTER_CLASS_PATTERN, "\\d")
        .replace(AsYouTypeFormatter.STANDALONE_DIGIT_PATTERN, "\\d");
    this.formattingTemplate = this.getFormattingTemplate(numberPattern, format.format);
    return this.formattingTemplate.length > 0;
  }

  // Formats the longest number the pattern matches, with each digit turned into a placeholder.
  private getFormattingTemplate(numberPattern: string, numberFormat: string): string {
    let pattern = this.regexCache.getPatternForRegex(numberPattern);
    let m = pattern.exec(AsYouTypeFormatter.LONGEST_PHONE_NUMBER);
    if (m === null || m[0].length < this.nationalNumber.length) {
      // The number is already longer than anything this format can hold.
      return "";
    }
    let template = m[0].replace(pattern, numberFormat);
    return template.split("9").join(AsYouTypeFormatter.DIGIT_PLACEHOLDER);
  }

  private inputAccruedNationalNumber(): string {
    if (this.nationalNumber.length === 0) {
      return this.prefixBeforeNationalNumber;
    }
    let tempNationalNumber = "";
    for (let c of this.nationalNumber) {
      tempNationalNumber = this.inputDigitHelper(c);
    }
    return this.ableToFormat ? this.appendNationalNumber(tempNationalNumber) : this.accruedInput;
  }

  // Puts the digit in the template's first free slot, returning the template up to that slot.
  private inputDigitHelper(nextChar: string): string {
    let placeholder = AsYouTypeFormatter.DIGIT_PLACEHOLDER;
    if (this.formattingTemplate.indexOf(placeholder, this.lastMatchPosition) >= 0) {
      let index = this.formattingTemplate.indexOf(placeholder);
      this.formattingTemplate =
          this.formattingTemplate.substring(0, index) + nextChar + this.formattingTemplate.substring(index + 1);
      this.lastMatchPosition = index;
      return this.formattingTemplate.substring(0, index + 1);
    }
    if (this.possibleFormats.length === 1) {
      // No other format can take over, so formatting stops.
      this.ableToFormat = false;
    }
    this.currentFormattingPattern = "";
    return this.accruedInput;
  }

  private appendNationalNumber(nationalNumber: string): string {
    let prefix = this.prefixBeforeNationalNumber;
    if (this.shouldAddSpaceAfterNationalPrefix
        && prefix.length > 0
        && !prefix.endsWith(AsYouTypeFormatter.SEPARATOR_BEFORE_NATIONAL_NUMBER)) {
      return prefix + AsYouTypeFormatter.SEPARATOR_BEFORE_NATIONAL_NUMBER + nationalNumber;
    }
    return prefix + nationalNumber;
  }

  private isNanpaNumberWithNationalPrefix(): boolean {
    // A leading 1 is the NANPA national prefix unless it is followed by 0 or 1 (area codes never
    // start with those).
    return this.currentMetadata !== null
        && this.currentMetadata.countryCode === 1
        && this.nationalNumber.charAt(0) === "1"
        && this.nationalNumber.charAt(1) !== "0"
        && this.nationalNumber.charAt(1) !== "1";
  }

  // Moves any national prefix from the national number to the prefix, and returns it.
  private removeNationalPrefixFromNationalNumber(): string {
    let startOfNationalNumber = 0;
    if (this.isNanpaNumberWithNationalPrefix()) {
      startOfNationalNumber = 1;
      this.prefixBeforeNationalNumber += "1" + AsYouTypeFormatter.SEPARATOR_BEFORE_NATIONAL_NUMBER;
      this.isCompleteNumber = true;
    } else {
      let nationalPrefixForParsing = this.currentMetadata?.nationalPrefixForParsing ?? null;
      if (nationalPrefixForParsing !== null) {
        let m = this.regexCache.lookingAt(nationalPrefixForParsing, this.nationalNumber);
        // An empty match (e.g. from an optional prefix) does not count.
        if (m !== null && m[0].length > 0) {
          this.isCompleteNumber = true;
          startOfNationalNumber = m[0].length;
          this.prefixBeforeNationalNumber += this.nationalNumber.substring(0, startOfNationalNumber);
        }
      }
    }
    let nationalPrefix = this.nationalNumber.substring(0, startOfNationalNumber);
    this.nationalNumber = this.nationalNumber.substring(startOfNationalNumber);
    return nationalPrefix;
  }

  private ableToExtractLongerNdd(): boolean {
    if (this.extractedNationalPrefix.length > 0) {
      // Put the extracted prefix back and try again with more digits.
      this.nationalNumber = this.extractedNationalPrefix + this.nationalNumber;
      let indexOfPreviousNdd = this.prefixBeforeNationalNumber.lastIndexOf(this.extractedNationalPrefix);
      this.prefixBeforeNationalNumber = this.prefixBeforeNationalNumber.substring(0, indexOfPreviousNdd);
    }
    return this.extractedNationalPrefix !== this.removeNationalPrefixFromNationalNumber();
  }

  // Looks for a plus sign or the region's IDD at the start of the digits typed so far.
  private attemptToExtractIdd(): boolean {
    // "NA" never matches digits, and stands in for a missing IDD.
    let internationalPrefix = this.currentMetadata?.internationalPrefix ?? "NA";
    let iddMatcher = this.regexCache.lookingAt(`\\+|${internationalPrefix}`, this.accruedInputWithoutFormatting);
    if (iddMatcher === null) {
      return false;
    }
    this.isCompleteNumber = true;
    let startOfCountryCallingCode = iddMatcher[0].length;
    this.nationalNumber = this.accruedInputWithoutFormatting.substring(startOfCountryCallingCode);
    this.prefixBeforeNationalNumber = this.accruedInputWithoutFormatting.substring(0, startOfCountryCallingCode);
    if (!this.accruedInputWithoutFormatting.startsWith("+")) {
      this.prefixBeforeNationalNumber += AsYouTypeFormatter.SEPARATOR_BEFORE_NATIONAL_NUMBER;
    }
    return true;
  }

  // Moves a calling code from the national number to the prefix, switching metadata if needed.
  private attemptToExtractCountryCallingCode(): boolean {
    if (this.nationalNumber.length === 0) {
      return false;
    }
    let extracted = this.util.extractCountryCode(this.nationalNumber);
    if (extracted === null) {
      return false;
    }
    let { countryCode, nationalNumber } = extracted;
    this.nationalNumber = nationalNumber;
    let newRegionCode = this.util.getRegionCodeForCountryCode(countryCode);
    if (newRegionCode === NumberClassifier.REGION_CODE_FOR_NON_GEO_ENTITY) {
      this.currentMetadata = this.util.getMetadataForNonGeographicalRegion(countryCode);
    } else if (newRegionCode !== this.defaultRegion) {
      this.currentMetadata = this.getMetadataForRegion(newRegionCode);
    }
    this.prefixBeforeNationalNumber +=
        String(countryCode) + AsYouTypeFormatter.SEPARATOR_BEFORE_NATIONAL_NUMBER;
    // The national prefix can't follow a calling code.
    this.extractedNationalPrefix = "";
    return true;
  }
}
