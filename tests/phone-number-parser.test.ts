/*~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~
 Copyright (c) 2023, David Beaumont (https://github.com/hagbard).

 This program and the accompanying materials are made available under the terms of the
 Eclipse Public License v. 2.0 available at https://www.eclipse.org/legal/epl-2.0, or the
 Apache License, Version 2.0 available at https://www.apache.org/licenses/LICENSE-2.0.

 SPDX-License-Identifier: EPL-2.0 OR Apache-2.0
 ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~*/

import { PhoneNumberParser } from "../src/phone-number-parser.js";
import { NumberClassifier } from "../src/number-classifier.js";
import { CountryCodeSource, PhoneNumber } from "../src/phone-number.js";
import { ErrorType, NumberParseError } from "../src/number-parse-error.js";
import { PhoneMetadata } from "../src/phone-metadata.js";
import { RegexCache } from "../src/regex-cache.js";
import { createTestMetadataSource, silentLogger } from "./test-util.js";

function createParser(): PhoneNumberParser {
  let classifier =
      new NumberClassifier(createTestMetadataSource(), new RegexCache(), silentLogger);
  return new PhoneNumberParser(classifier, silentLogger);
}

function metadataFor(regionCode: string): PhoneMetadata {
  let metadata = createTestMetadataSource().getMetadataForRegion(regionCode);
  if (metadata === null) {
    throw new Error(`No test metadata for: ${regionCode}`);
  }
  return metadata;
}

function parseErrorOf(fn: () => unknown): ErrorType|null {
  try {
    fn();
  } catch (e) {
    if (e instanceof NumberParseError) {
      return e.errorType;
    }
    throw e;
  }
  return null;
}

describe("PhoneNumberParser", () => {
  test('testParseNationalNumber', () => {
    let parser = createParser();
    expect(parser.parse("(650) 253-0000", "US")).toEqual(PhoneNumber.of(1, 6502530000n));
    expect(parser.parse("253-0000", "US")).toEqual(PhoneNumber.of(1, 2530000n));
    expect(parser.parse("020 8366 1177", "GB")).toEqual(PhoneNumber.of(44, 2083661177n));
    expect(parser.parse("2083661177", "GB")).toEqual(PhoneNumber.of(44, 2083661177n));
    expect(parser.parse("0011 1 650 253 0000", "AU")).toEqual(PhoneNumber.of(1, 6502530000n));
  });

  test('testParseWithLeadingZeros', () => {
    let parser = createParser();
    let number = parser.parse("02 3661 8300", "IT");
    expect(number.getNationalNumber()).toEqual(236618300n);
    expect(number.getNumberOfLeadingZeros()).toEqual(1);
    expect(number).toEqual(PhoneNumber.fromNationalSignificantNumber(39, "0236618300"));
    expect(parser.parse("+39 02 3661 8300", "US")).toEqual(number);
  });

  test('testParseInternationalNumber', () => {
    let parser = createParser();
    let gb = PhoneNumber.of(44, 2083661177n);
    expect(parser.parse("+44 20 8366 1177", "US")).toEqual(gb);
    expect(parser.parse("+44 20 8366 1177", null)).toEqual(gb);
    expect(parser.parse("+44 20 8366 1177", "ZZ")).toEqual(gb);
    expect(parser.parse("011 44 20 8366 1177", "US")).toEqual(gb);
    expect(parser.parse("00 44 20 8366 1177", "GB")).toEqual(gb);
    // Full-width plus sign.
    expect(parser.parse("\uFF0B44 20 8366 1177", null)).toEqual(gb);
    expect(parser.parse("+800 1234 5678", null)).toEqual(PhoneNumber.of(800, 12345678n));
  });

  test('testParseNationalPrefixTransform', () => {
    let parser = createParser();
    // The "15" after the area code marks a mobile number, which is rewritten with a leading "9".
    expect(parser.parse("011 15 2345-6789", "AR")).toEqual(PhoneNumber.of(54, 91123456789n));
    expect(parser.parse("011 2345-6789", "AR")).toEqual(PhoneNumber.of(54, 1123456789n));
    expect(parser.parse("+54 9 11 2345 6789", "AR")).toEqual(PhoneNumber.of(54, 91123456789n));
  });

  test('testParseAndKeepRawInput', () => {
    let parser = createParser();
    let number = parser.parseAndKeepRawInput("1 650 253 0000", "US");
    expect(number.getCountryCode()).toEqual(1);
    expect(number.getNationalNumber()).toEqual(6502530000n);
    expect(number.getRawInput()).toEqual("1 650 253 0000");
    expect(number.getCountryCodeSource()).toEqual(CountryCodeSource.FROM_NUMBER_WITHOUT_PLUS_SIGN);
    expect(number.getPreferredDomesticCarrierCode()).toBeNull();

    expect(parser.parseAndKeepRawInput("+44 20 8366 1177", "US").getCountryCodeSource())
        .toEqual(CountryCodeSource.FROM_NUMBER_WITH_PLUS_SIGN);
    expect(parser.parseAndKeepRawInput("011 44 20 8366 1177", "US").getCountryCodeSource())
        .toEqual(CountryCodeSource.FROM_NUMBER_WITH_IDD);
    expect(parser.parseAndKeepRawInput("(650) 253-0000", "US").getCountryCodeSource())
        .toEqual(CountryCodeSource.FROM_DEFAULT_COUNTRY);
    // Without raw input retention the source is not recorded.
    expect(parser.parse("+44 20 8366 1177", "US").getCountryCodeSource())
        .toEqual(CountryCodeSource.UNSPECIFIED);
  });

  test('testParseCarrierCode', () => {
    let parser = createParser();
    let number = parser.parseAndKeepRawInput("0 12 11 98765-4321", "BR");
    expect(number.getCountryCode()).toEqual(55);
    expect(number.getNationalNumber()).toEqual(11987654321n);
    expect(number.getPreferredDomesticCarrierCode()).toEqual("12");
    // The carrier code is only kept with the raw input.
    expect(parser.parse("0 12 11 98765-4321", "BR")).toEqual(PhoneNumber.of(55, 11987654321n));
  });

  test('testParseVanityNumber', () => {
    let parser = createParser();
    expect(parser.parse("1800 six-flag", "US")).toEqual(PhoneNumber.of(1, 8007493524n));
    expect(parser.parse("1-800-FLOWERS", "US")).toEqual(PhoneNumber.of(1, 8003569377n));
  });

  test('testParseExtension', () => {
    let parser = createParser();
    let expected = PhoneNumber.of(1, 6502530000n).with({ extension: "1234" });
    expect(parser.parse("+1 (650) 253-0000 ext. 1234", "US")).toEqual(expected);
    expect(parser.parse("(650) 253-0000 x1234", "US")).toEqual(expected);
    expect(parser.parse("650 253 0000 #1234", "US")).toEqual(expected);
    expect(parser.parse("tel:+1-650-253-0000;ext=1234", "US")).toEqual(expected);
  });

  test('testParseRfc3966', () => {
    let parser = createParser();
    let expected = PhoneNumber.of(1, 6502530000n);
    expect(parser.parse("tel:253-0000;phone-context=+1-650", "US")).toEqual(expected);
    expect(parser.parse("tel:+1-650-253-0000;isub=12345", "US")).toEqual(expected);
    // A local (non-global) phone context adds nothing.
    expect(parser.parse("tel:253-0000;phone-context=example.com", "US"))
        .toEqual(PhoneNumber.of(1, 2530000n));
  });

  test('testParseNonAsciiDigits', () => {
    let parser = createParser();
    expect(parser.parse("\uFF16\uFF15\uFF10 \uFF12\uFF15\uFF13 \uFF10\uFF10\uFF10\uFF10", "US"))
        .toEqual(PhoneNumber.of(1, 6502530000n));
    // Arabic-Indic digits.
    expect(parser.parse("+\u0664\u0664 20 8366 1177", null)).toEqual(PhoneNumber.of(44, 2083661177n));
  });

  test('testParseErrors', () => {
    let parser = createParser();
    expect(parseErrorOf(() => parser.parse(null, "US"))).toEqual(ErrorType.NOT_A_NUMBER);
    expect(parseErrorOf(() => parser.parse("5", "US"))).toEqual(ErrorType.NOT_A_NUMBER);
    expect(parseErrorOf(() => parser.parse("call me", "US"))).toEqual(ErrorType.NOT_A_NUMBER);
    expect(parseErrorOf(() => parser.parse("1".repeat(251), "US"))).toEqual(ErrorType.TOO_LONG);
    expect(parseErrorOf(() => parser.parse("650 253 0000", "ZZ")))
        .toEqual(ErrorType.INVALID_COUNTRY_CODE);
    expect(parseErrorOf(() => parser.parse("650 253 0000", null)))
        .toEqual(ErrorType.INVALID_COUNTRY_CODE);
    expect(parseErrorOf(() => parser.parse("+999 1234 5678", "US")))
        .toEqual(ErrorType.INVALID_COUNTRY_CODE);
    expect(parseErrorOf(() => parser.parse("011 1", "US"))).toEqual(ErrorType.TOO_SHORT_AFTER_IDD);
    // Two digits after the IDD are long enough to hold a calling code, but leave no national number.
    expect(parseErrorOf(() => parser.parse("011 44", "US"))).toEqual(ErrorType.TOO_SHORT_NSN);
    expect(parseErrorOf(() => parser.parse("+44 0", null))).toEqual(ErrorType.TOO_SHORT_NSN);
    expect(parseErrorOf(() => parser.parse("+44 12345678901234567", null)))
        .toEqual(ErrorType.TOO_LONG);
    expect(parseErrorOf(() => parser.parse("+44 20 8366 1177", null))).toBeNull();
  });

  test('testParseErrorMessage', () => {
    let parser = createParser();
    expect(() => parser.parse("650 253 0000", "ZZ")).toThrow("Missing or invalid default region.");
    let error = new NumberParseError(ErrorType.TOO_LONG, "Too long.");
    expect(error.toString()).toEqual("Error type: TOO_LONG. Too long.");
    expect(error.name).toEqual("NumberParseError");
  });

  test('testMaybeStripNationalPrefixAndCarrierCode', () => {
    let parser = createParser();
    expect(parser.maybeStripNationalPrefixAndCarrierCode("02083661177", metadataFor("GB")))
        .toEqual({ number: "2083661177", carrierCode: null, stripped: true });
    expect(parser.maybeStripNationalPrefixAndCarrierCode("0111523456789", metadataFor("AR")))
        .toEqual({ number: "91123456789", carrierCode: null, stripped: true });
    expect(parser.maybeStripNationalPrefixAndCarrierCode("01211987654321", metadataFor("BR")))
        .toEqual({ number: "11987654321", carrierCode: "12", stripped: true });
    expect(parser.maybeStripNationalPrefixAndCarrierCode("6502530000", metadataFor("US")))
        .toEqual({ number: "6502530000", carrierCode: null, stripped: false });
    expect(parser.maybeStripNationalPrefixAndCarrierCode("0236618300", metadataFor("IT")))
        .toEqual({ number: "0236618300", carrierCode: null, stripped: false });
  });

  test('testExtractCountryCode', () => {
    let parser = createParser();
    expect(parser.extractCountryCode("442083661177"))
        .toEqual({ countryCode: 44, nationalNumber: "2083661177" });
    expect(parser.extractCountryCode("16502530000"))
        .toEqual({ countryCode: 1, nationalNumber: "6502530000" });
    expect(parser.extractCountryCode("80012345678"))
        .toEqual({ countryCode: 800, nationalNumber: "12345678" });
    expect(parser.extractCountryCode("0442083661177")).toBeNull();
    expect(parser.extractCountryCode("99912345678")).toBeNull();
  });

  test('testBuildNationalNumberForParsing', () => {
    expect(PhoneNumberParser.buildNationalNumberForParsing("tel:253-0000;phone-context=+1-650"))
        .toEqual("+1-650253-0000");
    expect(PhoneNumberParser.buildNationalNumberForParsing(
        "tel:253-0000;phone-context=+1-650;foo=bar")).toEqual("+1-650253-0000");
    expect(PhoneNumberParser.buildNationalNumberForParsing("Tel: (650) 253-0000."))
        .toEqual("650) 253-0000");
  });
});
