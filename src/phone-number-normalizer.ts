/*~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~
 Copyright (c) 2023, David Beaumont (https://github.com/hagbard).

 This program and the accompanying materials are made available under the terms of the
 Eclipse Public License v. 2.0 available at https://www.eclipse.org/legal/epl-2.0, or the
 Apache License, Version 2.0 available at https://www.apache.org/licenses/LICENSE-2.0.

 SPDX-License-Identifier: EPL-2.0 OR Apache-2.0
 ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~*/

/** A phone number string split from its extension. */
export interface StrippedExtension {
  /** The number with any extension removed. */
  readonly number: string;
  /** The extension digits, or null if no extension was found. */
  readonly extension: string|null;
}

/**
 * Static helpers for extracting, cleaning and normalizing phone number text before it is parsed.
 *
 * All patterns here are compiled with the Unicode flag, so "digits" means any Unicode decimal
 * digit (e.g. full-width or Arabic-Indic digits) unless stated otherwise.
 */
export class PhoneNumberNormalizer {
  /** Minimum length of a national significant number. */
  static readonly MIN_LENGTH_FOR_NSN: number = 2;
  /** Maximum length of a national significant number. */
  static readonly MAX_LENGTH_FOR_NSN: number = 16;
  /** Maximum length of a country calling code. */
  static readonly MAX_LENGTH_COUNTRY_CODE: number = 3;
  /** Input longer than this is rejected before any pattern matching is attempted. */
  static readonly MAX_INPUT_STRING_LENGTH: number = 250;

  static readonly PLUS_SIGN: string = "+";
  static readonly STAR_SIGN: string = "*";
  static readonly PLUS_CHARS: string = "+\uFF0B";
  static readonly DIGITS: string = "\\p{Nd}";
  static readonly VALID_ALPHA: string = "A-Za-z";
  /**
   * Punctuation allowed between digits: dashes, slashes, spaces, dots, brackets and tildes, in
   * their ASCII, full-width and typographic forms, plus "x" (which can be found in vanity
   * numbers and extensions).
   */
  static readonly VALID_PUNCTUATION: string =
      "-x\u2010-\u2015\u2212\u30FC\uFF0D-\uFF0F \u00A0\u00AD\u200B\u2060\u3000()"
      + "\uFF08\uFF09\uFF3B\uFF3D.\\[\\]/~\u2053\u223C\uFF5E";

  static readonly RFC3966_EXTN_PREFIX: string = ";ext=";
  static readonly RFC3966_PREFIX: string = "tel:";
  static readonly RFC3966_PHONE_CONTEXT: string = ";phone-context=";
  static readonly RFC3966_ISDN_SUBADDRESS: string = ";isub=";

  // Single characters which can introduce an extension. When matching numbers in free text we
  // do not accept a comma, since it is too likely to be a list separator.
  private static readonly SINGLE_EXTN_SYMBOLS_FOR_MATCHING: string = "x\uFF58#\uFF03~\uFF5E";
  private static readonly SINGLE_EXTN_SYMBOLS_FOR_PARSING: string =
      ",;" + PhoneNumberNormalizer.SINGLE_EXTN_SYMBOLS_FOR_MATCHING;
  private static readonly CAPTURING_EXTN_DIGITS: string = `(${PhoneNumberNormalizer.DIGITS}{1,7})`;

  /** Extension grammar used when parsing (more lenient about separators). */
  static readonly EXTN_PATTERNS_FOR_PARSING: string =
      PhoneNumberNormalizer.createExtnPattern(PhoneNumberNormalizer.SINGLE_EXTN_SYMBOLS_FOR_PARSING);
  /** Extension grammar used when finding numbers in free text. */
  static readonly EXTN_PATTERNS_FOR_MATCHING: string =
      PhoneNumberNormalizer.createExtnPattern(PhoneNumberNormalizer.SINGLE_EXTN_SYMBOLS_FOR_MATCHING);

  // Grammar for a plausible phone number: either exactly two digits, or three or more digits
  // separated by punctuation, optionally with a leading plus and trailing letters.
  private static readonly VALID_PHONE_NUMBER: string =
      `${PhoneNumberNormalizer.DIGITS}{${PhoneNumberNormalizer.MIN_LENGTH_FOR_NSN}}`
      + `|[${PhoneNumberNormalizer.PLUS_CHARS}]*`
      + `(?:[${PhoneNumberNormalizer.VALID_PUNCTUATION}*]*${PhoneNumberNormalizer.DIGITS}){3,}`
      + `[${PhoneNumberNormalizer.VALID_PUNCTUATION}*${PhoneNumberNormalizer.VALID_ALPHA}`
      + `${PhoneNumberNormalizer.DIGITS}]*`;

  private static readonly VALID_PHONE_NUMBER_PATTERN: RegExp = new RegExp(
      `^(?:${PhoneNumberNormalizer.VALID_PHONE_NUMBER}`
      + `(?:${PhoneNumberNormalizer.EXTN_PATTERNS_FOR_PARSING})?)$`, "iu");
  private static readonly EXTN_PATTERN: RegExp =
      new RegExp(`(?:${PhoneNumberNormalizer.EXTN_PATTERNS_FOR_PARSING})$`, "iu");
  private static readonly VALID_ALPHA_PHONE_PATTERN: RegExp = /^(?:.*?[A-Za-z]){3}.*$/u;
  private static readonly VALID_START_CHAR_PATTERN: RegExp =
      new RegExp(`[${PhoneNumberNormalizer.PLUS_CHARS}${PhoneNumberNormalizer.DIGITS}]`, "u");
  // Anything which is not a number, a letter or '#' at the end of a string.
  private static readonly UNWANTED_END_CHAR_PATTERN: RegExp = /[^\p{N}\p{L}#]+$/u;
  // A second number (e.g. "x302/x2303") starts with a slash followed by an "x".
  private static readonly SECOND_NUMBER_START_PATTERN: RegExp = /[\\/] *x/u;
  private static readonly DECIMAL_DIGIT: RegExp = /^\p{Nd}$/u;

  private static readonly ALPHA_MAPPINGS: ReadonlyMap<string, string> =
      PhoneNumberNormalizer.keypadMappings();
  private static readonly ALL_PLUS_NUMBER_GROUPING_SYMBOLS: ReadonlyMap<string, string> =
      PhoneNumberNormalizer.groupingSymbolMappings();

  private static createExtnPattern(singleExtnSymbols: string): string {
    // RFC3966 extensions, then explicit labels (in several languages and full-width forms),
    // then North American style "- 503#".
    return PhoneNumberNormalizer.RFC3966_EXTN_PREFIX + PhoneNumberNormalizer.CAPTURING_EXTN_DIGITS
        + "|[ \u00A0\\t,]*"
        + "(?:e?xt(?:ensi(?:o\u0301?|\u00F3))?n?|\uFF45?\uFF58\uFF54\uFF4E?|"
        + `[${singleExtnSymbols}]|int|anexo|\uFF49\uFF4E\uFF54)`
        + "[:\\.\uFF0E]?[ \u00A0\\t,\\-]*" + PhoneNumberNormalizer.CAPTURING_EXTN_DIGITS + "#?"
        + `|[\\- ]+(${PhoneNumberNormalizer.DIGITS}{1,5})#`;
  }

  // ITU E.161 keypad letters.
  private static keypadMappings(): Map<string, string> {
    let keys = ["ABC", "DEF", "GHI", "JKL", "MNO", "PQRS", "TUV", "WXYZ"];
    let map = new Map<string, string>();
    keys.forEach((letters, i) => [...letters].forEach(c => map.set(c, String(i + 2))));
    return map;
  }

  private static groupingSymbolMappings(): Map<string, string> {
    let map = new Map<string, string>();
    for (let c of PhoneNumberNormalizer.ALPHA_MAPPINGS.keys()) {
      map.set(c, c);
      map.set(c.toLowerCase(), c);
    }
    for (let c of "0123456789") {
      map.set(c, c);
    }
    for (let c of "-\uFF0D\u2010\u2011\u2012\u2013\u2014\u2015\u2212") {
      map.set(c, "-");
    }
    for (let c of "/\uFF0F") {
      map.set(c, "/");
    }
    for (let c of " \u3000\u2060") {
      map.set(c, " ");
    }
    for (let c of ".\uFF0E") {
      map.set(c, ".");
    }
    return map;
  }

  /**
   * Extracts the part of the given text which could be a phone number. Everything before the
   * first plus sign or digit is removed, as are trailing characters which cannot end a number
   * (anything other than a letter, a digit or '#'). If a second number is found (e.g. as in
   * "x302/x2303") only the first is kept.
   *
   * Returns the empty string if no phone number could be found.
   */
  static extractPossibleNumber(text: string): string {
    let start = text.search(PhoneNumberNormalizer.VALID_START_CHAR_PATTERN);
    if (start < 0) {
      return "";
    }
    let number = text.substring(start);
    let trailing = number.search(PhoneNumberNormalizer.UNWANTED_END_CHAR_PATTERN);
    if (trailing >= 0) {
      number = number.substring(0, trailing);
    }
    let secondNumber = number.search(PhoneNumberNormalizer.SECOND_NUMBER_START_PATTERN);
    if (secondNumber >= 0) {
      number = number.substring(0, secondNumber);
    }
    return number;
  }

  /**
   * Checks whether a string could be a phone number (without regard to any region). This does not
   * check validity, only that the string has the right mix of digits, punctuation and letters,
   * optionally followed by an extension.
   */
  static isViablePhoneNumber(number: string): boolean {
    if (number.length < PhoneNumberNormalizer.MIN_LENGTH_FOR_NSN) {
      return false;
    }
    return PhoneNumberNormalizer.VALID_PHONE_NUMBER_PATTERN.test(number);
  }

  /**
   * Normalizes a phone number string.
   *
   * If the string contains three or more letters it is treated as a vanity number: letters are
   * mapped to their keypad digits and everything other than ASCII digits is dropped. Otherwise
   * all decimal digits (of any script) are converted to ASCII and everything else is dropped.
   */
  static normalize(number: string): string {
    if (PhoneNumberNormalizer.VALID_ALPHA_PHONE_PATTERN.test(number)) {
      return PhoneNumberNormalizer.normalizeHelper(number, PhoneNumberNormalizer.alphaPhoneMapping, true);
    }
    return PhoneNumberNormalizer.normalizeDigitsOnly(number);
  }

  /** Converts every decimal digit (of any script) to ASCII, dropping all other characters. */
  static normalizeDigitsOnly(number: string): string {
    let out = "";
    for (let c of number) {
      let d = PhoneNumberNormalizer.digitValue(c);
      if (d >= 0) {
        out += d;
      }
    }
    return out;
  }

  /** Keeps only the characters which can be dialled: ASCII digits, '+', '*' and '#'. */
  static normalizeDiallableCharsOnly(number: string): string {
    return number.replace(/[^0-9+*#]/g, "");
  }

  /**
   * Converts keypad letters to digits, leaving everything else (including punctuation) alone.
   * For example "1-800-FLOWERS" becomes "1-800-3569377".
   */
  static convertAlphaCharactersInNumber(number: string): string {
    return PhoneNumberNormalizer.normalizeHelper(number, PhoneNumberNormalizer.alphaPhoneMapping, false);
  }

  /**
   * Normalizes grouping symbols (dashes, slashes, spaces and dots) to their ASCII forms and letters
   * to upper case, dropping all other characters (including the plus sign and non-ASCII digits).
   */
  static normalizeGroupingSymbols(number: string): string {
    return PhoneNumberNormalizer.normalizeHelper(
        number, c => PhoneNumberNormalizer.ALL_PLUS_NUMBER_GROUPING_SYMBOLS.get(c), true);
  }

  /**
   * Whether the given text is a vanity number (three or more letters), ignoring any extension.
   * Text which is not a viable phone number returns false.
   */
  static isAlphaNumber(number: string): boolean {
    if (!PhoneNumberNormalizer.isViablePhoneNumber(number)) {
      return false;
    }
    let stripped = PhoneNumberNormalizer.maybeStripExtension(number).number;
    return PhoneNumberNormalizer.VALID_ALPHA_PHONE_PATTERN.test(stripped);
  }

  /**
   * Strips any extension (as in "ext. 1234", "x1234" or ";ext=1234") from the end of the number.
   * The extension is only removed if what remains is still a viable phone number.
   */
  static maybeStripExtension(number: string): StrippedExtension {
    let m = PhoneNumberNormalizer.EXTN_PATTERN.exec(number);
    if (m !== null && PhoneNumberNormalizer.isViablePhoneNumber(number.substring(0, m.index))) {
      // The extension is the first group which matched (only one alternative can match).
      for (let i = 1; i < m.length; i++) {
        let group = m[i];
        if (group !== undefined) {
          return { number: number.substring(0, m.index), extension: group };
        }
      }
    }
    return { number, extension: null };
  }

  /**
   * Returns the value (0-9) of a Unicode decimal digit, or -1 if the character is not a decimal
   * digit. Unicode assigns decimal digits in contiguous runs of ten, in ascending order, so the
   * value is the offset from the start of the run modulo ten.
   */
  static digitValue(c: string): number {
    let cp = c.codePointAt(0);
    if (cp === undefined || c.length > 2 || !PhoneNumberNormalizer.DECIMAL_DIGIT.test(c)) {
      return -1;
    }
    if (cp <= 0x39) {
      return cp - 0x30;
    }
    let start = cp;
    while (PhoneNumberNormalizer.DECIMAL_DIGIT.test(String.fromCodePoint(start - 1))) {
      start--;
    }
    return (cp - start) % 10;
  }

  private static alphaPhoneMapping(c: string): string|undefined {
    if (c >= "0" && c <= "9" && c.length === 1) {
      return c;
    }
    return PhoneNumberNormalizer.ALPHA_MAPPINGS.get(c.toUpperCase());
  }

  private static normalizeHelper(
      number: string, mapping: (c: string) => string|undefined, removeNonMatches: boolean): string {
    let out = "";
    for (let c of number) {
      let mapped = mapping(c);
      if (mapped !== undefined) {
        out += mapped;
      } else if (!removeNonMatches) {
        out += c;
      }
    }
    return out;
  }
}
