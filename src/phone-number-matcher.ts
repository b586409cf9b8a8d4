/*~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~
 Copyright (c) 2023, David Beaumont (https://github.com/hagbard).

 This program and the accompanying materials are made available under the terms of the
 Eclipse Public License v. 2.0 available at https://www.eclipse.org/legal/epl-2.0, or the
 Apache License, Version 2.0 available at https://www.apache.org/licenses/LICENSE-2.0.

 SPDX-License-Identifier: EPL-2.0 OR Apache-2.0
 ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~*/

import { CountryCodeSource, PhoneNumber } from "./phone-number.js";
import { PhoneNumberMatch } from "./phone-number-match.js";
import { PhoneNumberNormalizer } from "./phone-number-normalizer.js";
import { PhoneNumberFormat } from "./phone-number-formatter.js";
import { MatchType } from "./match-results.js";
import { NumberParseError } from "./number-parse-error.js";
import type { PhoneNumberUtil } from "./phone-number-util.js";

/**
 * How strictly candidate numbers found in text are checked. Each level accepts a subset of the
 * numbers accepted by the level before it.
 */
export enum Leniency {
  /** The number is a possible number (see `PhoneNumberUtil.isPossibleNumber()`). */
  POSSIBLE,
  /**
   * The number is valid, and written with a national prefix where its format requires one. It
   * must not be directly preceded or followed by a Latin letter or a currency symbol.
   */
  VALID,
  /**
   * As VALID, and each group of digits in the national format of the number appears intact in the
   * candidate (e.g. "65 02 53 00 00" is rejected for a number formatted as "650 253 0000").
   */
  STRICT_GROUPING,
  /** As VALID, and the candidate is grouped exactly as the number would be formatted. */
  EXACT_GROUPING,
}

/**
 * Decides whether a candidate matches the grouping of a number's formatted groups.
 */
type NumberGroupingChecker = (
    number: PhoneNumber, normalizedCandidate: string, formattedNumberGroups: ReadonlyArray<string>) => boolean;

/**
 * A lazy iterator over the phone numbers found in a piece of text.
 *
 * The text is scanned from the start for candidates (runs of digits and punctuation, optionally
 * with a leading bracket or plus sign and a trailing extension). Each candidate is parsed and
 * checked at the requested leniency; if that fails, parts of it (such as the text after a
 * slash or before a bracket) are tried instead. Candidates which look like dates, times or
 * publication page ranges are skipped.
 *
 * Scanning stops early after `maxTries` failed candidates, which bounds the work done on text
 * which contains many number-like sequences.
 */
export class PhoneNumberMatcher implements IterableIterator<PhoneNumberMatch> {
  private static readonly OPENING_PARENS: string = "(\\[\uFF08\uFF3B";
  private static readonly CLOSING_PARENS: string = ")\\]\uFF09\uFF3D";
  private static readonly NON_PARENS: string =
      `[^${PhoneNumberMatcher.OPENING_PARENS}${PhoneNumberMatcher.CLOSING_PARENS}]`;
  // Allows a calling code, plus the longest national number, split into single digit blocks.
  private static readonly DIGIT_BLOCK_LIMIT: number =
      PhoneNumberNormalizer.MAX_LENGTH_FOR_NSN + PhoneNumberNormalizer.MAX_LENGTH_COUNTRY_CODE;
  private static readonly PUNCTUATION: string = `[${PhoneNumberNormalizer.VALID_PUNCTUATION}]{0,4}`;
  private static readonly DIGIT_SEQUENCE: string =
      `${PhoneNumberNormalizer.DIGITS}{1,${PhoneNumberMatcher.DIGIT_BLOCK_LIMIT}}`;
  private static readonly LEAD_CLASS: string =
      `[${PhoneNumberMatcher.OPENING_PARENS}${PhoneNumberNormalizer.PLUS_CHARS}]`;

  // Source of the candidate pattern. Each matcher compiles its own copy, since a global pattern
  // holds the position of the last match.
  private static readonly PATTERN: string =
      `(?:${PhoneNumberMatcher.LEAD_CLASS}${PhoneNumberMatcher.PUNCTUATION}){0,2}`
      + PhoneNumberMatcher.DIGIT_SEQUENCE
      + `(?:${PhoneNumberMatcher.PUNCTUATION}${PhoneNumberMatcher.DIGIT_SEQUENCE})`
      + `{0,${PhoneNumberMatcher.DIGIT_BLOCK_LIMIT}}`
      + `(?:${PhoneNumberNormalizer.EXTN_PATTERNS_FOR_MATCHING})?`;
  private static readonly LEAD_CLASS_PATTERN: RegExp = new RegExp(`^${PhoneNumberMatcher.LEAD_CLASS}`, "u");
  // At most three bracketed groups, with at most one unmatched bracket at the start.
  private static readonly MATCHING_BRACKETS: RegExp = new RegExp(
      `^(?:(?:[${PhoneNumberMatcher.OPENING_PARENS}])?`
      + `(?:${PhoneNumberMatcher.NON_PARENS}+[${PhoneNumberMatcher.CLOSING_PARENS}])?`
      + `${PhoneNumberMatcher.NON_PARENS}+`
      + `(?:[${PhoneNumberMatcher.OPENING_PARENS}]${PhoneNumberMatcher.NON_PARENS}+`
      + `[${PhoneNumberMatcher.CLOSING_PARENS}]){0,3}`
      + `${PhoneNumberMatcher.NON_PARENS}*)$`, "u");
  // Page ranges in publications (e.g. "211-227 (2003)").
  private static readonly PUB_PAGES: RegExp = /\d{1,5}-+\d{1,5}\s{0,4}\(\d{1,4}/;
  // Dates such as "08/31/95".
  private static readonly SLASH_SEPARATED_DATES: RegExp =
      /(?:(?:[0-3]?\d\/[01]?\d)|(?:[01]?\d\/[0-3]?\d))\/(?:[12]\d)?\d{2}/;
  // Time stamps such as "2012-01-02 08:00", where the minutes follow the candidate.
  private static readonly TIME_STAMPS: RegExp = /[12]\d{3}[-/]?[01]\d[-/]?[0-3]\d +[0-2]\d$/;
  private static readonly TIME_STAMPS_SUFFIX: RegExp = /^:[0-5]\d/;
  // Patterns for extracting a number from inside a candidate which failed to match. Each has a
  // single group, which ends where the match ends.
  private static readonly INNER_MATCHES: ReadonlyArray<RegExp> = [
    // Numbers separated by slashes, e.g. "650-253-0000/650-253-0001".
    /\/+(.*)/gu,
    // Text after a bracket, e.g. "(650) 253-0000 (home)".
    /(\([^(]*)/gu,
    // Numbers separated by a hyphen with spaces, e.g. "650 253 0000 - 650 253 0001".
    /(?:\p{Z}-|-\p{Z})\p{Z}*(.+)/gu,
    // Numbers separated by dashes other than a hyphen.
    /[\u2012-\u2015\uFF0D]\p{Z}*(.+)/gu,
    // Numbers separated by dots, e.g. "650.253.0000. 650.253.0001".
    /\.+\p{Z}*([^.]+)/gu,
    // Numbers separated by spaces.
    /\p{Z}+(\P{Z}+)/gu,
  ];
  private static readonly FIRST_GROUP_ONLY_PREFIX_PATTERN: string = "\\(?\\$1\\)?";
  private static readonly LETTER_OR_MARK: RegExp = /^[\p{L}\p{Mn}]$/u;
  private static readonly INVALID_PUNCTUATION: RegExp = /^[%\p{Sc}]$/u;

  private readonly pattern: RegExp = new RegExp(PhoneNumberMatcher.PATTERN, "giu");
  private searchIndex: number = 0;
  private done: boolean = false;

  constructor(
      private readonly util: PhoneNumberUtil,
      private readonly text: string,
      private readonly preferredRegion: string|null,
      private readonly leniency: Leniency,
      private maxTries: number) {
    if (maxTries < 0) {
      throw new Error(`Max tries must be >= 0: ${maxTries}`);
    }
  }

  [Symbol.iterator](): IterableIterator<PhoneNumberMatch> {
    return this;
  }

  next(): IteratorResult<PhoneNumberMatch> {
    let match = this.done ? null : this.find(this.searchIndex);
    if (match === null) {
      this.done = true;
      return { done: true, value: undefined };
    }
    this.searchIndex = match.end;
    return { done: false, value: match };
  }

  // Finds the next match at or after the given index.
  private find(index: number): PhoneNumberMatch|null {
    while (this.maxTries > 0) {
      this.pattern.lastIndex = index;
      let m = this.pattern.exec(this.text);
      if (m === null) {
        return null;
      }
      let start = m.index;
      let candidate = PhoneNumberMatcher.trimAfterFirstMatch(
          /[\\/] *x/u, this.text.substring(start, start + m[0].length));
      let match = this.extractMatch(candidate, start);
      if (match !== null) {
        return match;
      }
      // An empty candidate would never advance the search.
      index = start + Math.max(candidate.length, 1);
      this.maxTries--;
    }
    return null;
  }

  private static trimAfterFirstMatch(pattern: RegExp, candidate: string): string {
    let index = candidate.search(pattern);
    return index >= 0 ? candidate.substring(0, index) : candidate;
  }

  /**
   * Whether a character is a Latin letter (or combining mark) which, when directly adjacent to a
   * candidate, suggests the candidate is part of a word or code rather than a phone number.
   */
  static isLatinLetter(c: string): boolean {
    if (!PhoneNumberMatcher.LETTER_OR_MARK.test(c)) {
      return false;
    }
    let cp = c.charCodeAt(0);
    return cp <= 0x024F                    // Basic Latin to Latin Extended-B
        || (cp >= 0x0300 && cp <= 0x036F)  // Combining diacritical marks
        || (cp >= 0x1E00 && cp <= 0x1EFF); // Latin Extended Additional
  }

  private static isInvalidPunctuationSymbol(c: string): boolean {
    return PhoneNumberMatcher.INVALID_PUNCTUATION.test(c);
  }

  private extractMatch(candidate: string, offset: number): PhoneNumberMatch|null {
    if (PhoneNumberMatcher.SLASH_SEPARATED_DATES.test(candidate)) {
      return null;
    }
    if (PhoneNumberMatcher.TIME_STAMPS.test(candidate)) {
      let followingText = this.text.substring(offset + candidate.length);
      if (PhoneNumberMatcher.TIME_STAMPS_SUFFIX.test(followingText)) {
        return null;
      }
    }
    return this.parseAndVerify(candidate, offset) ?? this.extractInnerMatch(candidate, offset);
  }

  // Tries to find a number within a candidate which failed to match as a whole.
  private extractInnerMatch(candidate: string, offset: number): PhoneNumberMatch|null {
    for (let possibleInnerMatch of PhoneNumberMatcher.INNER_MATCHES) {
      let isFirstMatch = true;
      for (let m of candidate.matchAll(possibleInnerMatch)) {
        if (this.maxTries <= 0) {
          break;
        }
        let matchStart = m.index ?? 0;
        if (isFirstMatch) {
          // Try the text before the first separator.
          let group = PhoneNumberMatcher.trimUnwantedEnd(candidate.substring(0, matchStart));
          let match = this.parseAndVerify(group, offset);
          if (match !== null) {
            return match;
          }
          this.maxTries--;
          isFirstMatch = false;
        }
        let group = m[1] ?? "";
        let groupStart = matchStart + m[0].length - group.length;
        let match = this.parseAndVerify(PhoneNumberMatcher.trimUnwantedEnd(group), offset + groupStart);
        if (match !== null) {
          return match;
        }
        this.maxTries--;
      }
    }
    return null;
  }

  private static trimUnwantedEnd(s: string): string {
    return PhoneNumberMatcher.trimAfterFirstMatch(/[^\p{N}\p{L}#]+$/u, s);
  }

  // Parses a candidate and checks it at this matcher's leniency, returning a match if it passes.
  private parseAndVerify(candidate: string, offset: number): PhoneNumberMatch|null {
    // Unbalanced brackets and publication page numbers are never phone numbers.
    if (!PhoneNumberMatcher.MATCHING_BRACKETS.test(candidate)
        || PhoneNumberMatcher.PUB_PAGES.test(candidate)) {
      return null;
    }
    if (this.leniency >= Leniency.VALID) {
      // Numbers directly attached to a Latin letter or currency symbol are rejected, unless the
      // candidate starts with a bracket or plus sign.
      if (offset > 0 && !PhoneNumberMatcher.LEAD_CLASS_PATTERN.test(candidate)) {
        let previousChar = this.text.charAt(offset - 1);
        if (PhoneNumberMatcher.isInvalidPunctuationSymbol(previousChar)
            || PhoneNumberMatcher.isLatinLetter(previousChar)) {
          return null;
        }
      }
      let lastCharIndex = offset + candidate.length;
      if (lastCharIndex < this.text.length) {
        let nextChar = this.text.charAt(lastCharIndex);
        if (PhoneNumberMatcher.isInvalidPunctuationSymbol(nextChar)
            || PhoneNumberMatcher.isLatinLetter(nextChar)) {
          return null;
        }
      }
    }
    let number: PhoneNumber;
    try {
      number = this.util.parseAndKeepRawInput(candidate, this.preferredRegion);
    } catch (e) {
      if (e instanceof NumberParseError) {
        return null;
      }
      throw e;
    }
    if (!this.verify(number, candidate)) {
      return null;
    }
    return new PhoneNumberMatch(offset, candidate, number.with({
      countryCodeSource: CountryCodeSource.UNSPECIFIED,
      rawInput: null,
      preferredDomesticCarrierCode: null,
    }));
  }

  private verify(number: PhoneNumber, candidate: string): boolean {
    switch (this.leniency) {
      case Leniency.POSSIBLE:
        return this.util.isPossibleNumber(number);
      case Leniency.VALID:
        return this.util.isValidNumber(number)
            && this.containsOnlyValidXChars(number, candidate)
            && this.isNationalPrefixPresentIfRequired(number);
      case Leniency.STRICT_GROUPING:
        return this.util.isValidNumber(number)
            && this.containsOnlyValidXChars(number, candidate)
            && !PhoneNumberMatcher.containsMoreThanOneSlashInNationalNumber(number, candidate)
            && this.isNationalPrefixPresentIfRequired(number)
            && this.checkNumberGroupingIsValid(
                number, candidate, (n, c, groups) => this.allNumberGroupsRemainGrouped(n, c, groups));
      case Leniency.EXACT_GROUPING:
        return this.util.isValidNumber(number)
            && this.containsOnlyValidXChars(number, candidate)
            && !PhoneNumberMatcher.containsMoreThanOneSlashInNationalNumber(number, candidate)
            && this.isNationalPrefixPresentIfRequired(number)
            && this.checkNumberGroupingIsValid(
                number, candidate, (n, c, groups) => this.allNumberGroupsAreExactlyPresent(n, c, groups));
    }
  }

  /**
   * An 'x' in a candidate must either start the extension, or (as "xx") separate a carrier code
   * from the number (in which case what follows must be the same number).
   */
  private containsOnlyValidXChars(number: PhoneNumber, candidate: string): boolean {
    for (let index = 0; index < candidate.length - 1; index++) {
      let c = candidate.charAt(index);
      if (c === "x" || c === "X") {
        let next = candidate.charAt(index + 1);
        if (next === "x" || next === "X") {
          index++;
          if (this.util.isNumberMatch(number, candidate.substring(index)) !== MatchType.NSN_MATCH) {
            return false;
          }
        } else if (PhoneNumberNormalizer.normalizeDigitsOnly(candidate.substring(index))
            !== (number.getExtension() ?? "")) {
          return false;
        }
      }
    }
    return true;
  }

  // A number parsed as national must contain the national prefix if its format rule requires it.
  private isNationalPrefixPresentIfRequired(number: PhoneNumber): boolean {
    if (number.getCountryCodeSource() !== CountryCodeSource.FROM_DEFAULT_COUNTRY) {
      return true;
    }
    let regionCode = this.util.getRegionCodeForCountryCode(number.getCountryCode());
    let metadata = this.util.getMetadataForRegion(regionCode);
    if (metadata === null) {
      return true;
    }
    let nationalNumber = this.util.getNationalSignificantNumber(number);
    let formatRule = this.util.chooseFormattingPatternForNumber(metadata.numberFormats, nationalNumber);
    if (formatRule === null || formatRule.nationalPrefixFormattingRule.length === 0) {
      return true;
    }
    if (formatRule.nationalPrefixOptionalWhenFormatting
        || this.util.getRegexCache().matchesEntirely(
            PhoneNumberMatcher.FIRST_GROUP_ONLY_PREFIX_PATTERN, formatRule.nationalPrefixFormattingRule)) {
      // The national prefix is not needed (or the rule only adds brackets).
      return true;
    }
    let rawInput = PhoneNumberNormalizer.normalizeDigitsOnly(number.getRawInput() ?? "");
    return this.util.maybeStripNationalPrefixAndCarrierCode(rawInput, metadata).stripped;
  }

  private static containsMoreThanOneSlashInNationalNumber(number: PhoneNumber, candidate: string): boolean {
    let firstSlashInBodyIndex = candidate.indexOf("/");
    if (firstSlashInBodyIndex < 0) {
      return false;
    }
    let secondSlashInBodyIndex = candidate.indexOf("/", firstSlashInBodyIndex + 1);
    if (secondSlashInBodyIndex < 0) {
      return false;
    }
    // A slash after the calling code (e.g. "+49/69/2013") does not count.
    let source = number.getCountryCodeSource();
    let candidateHasCountryCode = source === CountryCodeSource.FROM_NUMBER_WITH_PLUS_SIGN
        || source === CountryCodeSource.FROM_NUMBER_WITHOUT_PLUS_SIGN;
    if (candidateHasCountryCode
        && PhoneNumberNormalizer.normalizeDigitsOnly(candidate.substring(0, firstSlashInBodyIndex))
            === String(number.getCountryCode())) {
      return candidate.substring(secondSlashInBodyIndex + 1).includes("/");
    }
    return true;
  }

  private checkNumberGroupingIsValid(
      number: PhoneNumber, candidate: string, checker: NumberGroupingChecker): boolean {
    let normalizedCandidate = PhoneNumberMatcher.normalizeDigitsKeepingNonDigits(candidate);
    if (checker(number, normalizedCandidate, this.getNationalNumberGroups(number))) {
      return true;
    }
    // Numbers are often written in groupings other than the one used for formatting.
    let alternateFormats = this.util.getMetadataSource().getAlternateFormatsForCountry(number.getCountryCode());
    if (alternateFormats === null) {
      return false;
    }
    let nsn = this.util.getNationalSignificantNumber(number);
    for (let alternateFormat of alternateFormats) {
      let leadingDigitsPatterns = alternateFormat.leadingDigitsPatterns;
      // Only the first (least specific) leading digits pattern is tested.
      if (leadingDigitsPatterns.length > 0
          && this.util.getRegexCache().lookingAt(leadingDigitsPatterns[0], nsn) === null) {
        continue;
      }
      let formattedNumberGroups =
          this.util.formatNsnUsingPattern(nsn, alternateFormat, PhoneNumberFormat.RFC3966).split("-");
      if (checker(number, normalizedCandidate, formattedNumberGroups)) {
        return true;
      }
    }
    return false;
  }

  // The digit groups of the national number, as formatted in RFC3966 format (without extension).
  private getNationalNumberGroups(number: PhoneNumber): string[] {
    let rfc3966Format = this.util.format(number, PhoneNumberFormat.RFC3966);
    let endIndex = rfc3966Format.indexOf(";");
    if (endIndex < 0) {
      endIndex = rfc3966Format.length;
    }
    // The calling code is followed by the first hyphen.
    let startIndex = rfc3966Format.indexOf("-") + 1;
    return rfc3966Format.substring(startIndex, endIndex).split("-");
  }

  private allNumberGroupsRemainGrouped(
      number: PhoneNumber, normalizedCandidate: string, formattedNumberGroups: ReadonlyArray<string>): boolean {
    let fromIndex = 0;
    if (number.getCountryCodeSource() !== CountryCodeSource.FROM_DEFAULT_COUNTRY) {
      // Skip the calling code.
      let countryCode = String(number.getCountryCode());
      fromIndex = normalizedCandidate.indexOf(countryCode) + countryCode.length;
    }
    for (let i = 0; i < formattedNumberGroups.length; i++) {
      fromIndex = normalizedCandidate.indexOf(formattedNumberGroups[i], fromIndex);
      if (fromIndex < 0) {
        return false;
      }
      fromIndex += formattedNumberGroups[i].length;
      if (i === 0 && fromIndex < normalizedCandidate.length) {
        // The first group may legitimately run into the next where a national prefix was written
        // without a separator (e.g. "0 8012345678" formatted as "0801 234 5678").
        let region = this.util.getRegionCodeForCountryCode(number.getCountryCode());
        if (this.util.getNddPrefixForRegion(region, true) !== null
            && PhoneNumberNormalizer.digitValue(normalizedCandidate.charAt(fromIndex)) >= 0) {
          let nsn = this.util.getNationalSignificantNumber(number);
          return normalizedCandidate.substring(fromIndex - formattedNumberGroups[i].length).startsWith(nsn);
        }
      }
    }
    // The rest of the candidate must contain the extension.
    return normalizedCandidate.substring(fromIndex).includes(number.getExtension() ?? "");
  }

  private allNumberGroupsAreExactlyPresent(
      number: PhoneNumber, normalizedCandidate: string, formattedNumberGroups: ReadonlyArray<string>): boolean {
    let candidateGroups = normalizedCandidate.split(/\D+/);
    while (candidateGroups.length > 1 && candidateGroups[candidateGroups.length - 1] === "") {
      candidateGroups.pop();
    }
    // The extension, if present, is the last group of the candidate.
    let candidateNumberGroupIndex = number.hasExtension()
        ? candidateGroups.length - 2
        : candidateGroups.length - 1;
    if (candidateGroups.length === 1
        || (candidateNumberGroupIndex >= 0
            && candidateGroups[candidateNumberGroupIndex].includes(
                this.util.getNationalSignificantNumber(number)))) {
      return true;
    }
    // Compare groups from the end, since the start of the candidate may hold a calling code or
    // national prefix.
    for (let formattedNumberGroupIndex = formattedNumberGroups.length - 1;
        formattedNumberGroupIndex > 0 && candidateNumberGroupIndex >= 0;
        formattedNumberGroupIndex--, candidateNumberGroupIndex--) {
      if (candidateGroups[candidateNumberGroupIndex] !== formattedNumberGroups[formattedNumberGroupIndex]) {
        return false;
      }
    }
    // The first group may be preceded by a national prefix or calling code.
    return candidateNumberGroupIndex >= 0
        && candidateGroups[candidateNumberGroupIndex].endsWith(formattedNumberGroups[0]);
  }

  // Converts decimal digits of any script to ASCII, keeping all other characters.
  private static normalizeDigitsKeepingNonDigits(s: string): string {
    let out = "";
    for (let c of s) {
      let d = PhoneNumberNormalizer.digitValue(c);
      out += d >= 0 ? String(d) : c;
    }
    return out;
  }
}
