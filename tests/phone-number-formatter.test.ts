/*~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~
 Copyright (c) 2023, David Beaumont (https://github.com/hagbard).

 This program and the accompanying materials are made available under the terms of the
 Eclipse Public License v. 2.0 available at https://www.eclipse.org/legal/epl-2.0, or the
 Apache License, Version 2.0 available at https://www.apache.org/licenses/LICENSE-2.0.

 SPDX-License-Identifier: EPL-2.0 OR Apache-2.0
 ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~*/

import { PhoneNumber } from "../src/phone-number.js";
import { PhoneNumberFormat } from "../src/phone-number-formatter.js";
import { NumberFormat } from "../src/phone-metadata.js";
import { createTestUtil } from "./test-util.js";

const US_NUMBER = PhoneNumber.of(1, 6502530000n);
const US_TOLL_FREE = PhoneNumber.of(1, 8002345678n);
const GB_NUMBER = PhoneNumber.of(44, 2083661177n);
const GB_MOBILE = PhoneNumber.of(44, 7400123456n);
const IT_NUMBER = PhoneNumber.fromNationalSignificantNumber(39, "0236618300");
const AR_MOBILE = PhoneNumber.of(54, 91123456789n);
const AR_NUMBER = PhoneNumber.of(54, 1123456789n);
const BR_MOBILE = PhoneNumber.of(55, 11987654321n);
const AU_NUMBER = PhoneNumber.of(61, 212345678n);
const AU_MOBILE = PhoneNumber.of(61, 412345678n);
const CO_FIXED_LINE = PhoneNumber.of(57, 12345678n);
const CO_MOBILE = PhoneNumber.of(57, 3211234567n);
const INTERNATIONAL_TOLL_FREE = PhoneNumber.of(800, 12345678n);

function userFormat(format: string, nationalPrefixFormattingRule: string): NumberFormat {
  return {
    pattern: "(\\d{3})(\\d{3})(\\d{4})",
    format,
    leadingDigitsPatterns: [],
    nationalPrefixFormattingRule,
    nationalPrefixOptionalWhenFormatting: false,
    domesticCarrierCodeFormattingRule: "",
  };
}

describe("PhoneNumberFormatter", () => {
  test('testFormatUSNumber', () => {
    let util = createTestUtil();
    expect(util.format(US_NUMBER, PhoneNumberFormat.NATIONAL)).toEqual("(650) 253-0000");
    expect(util.format(US_NUMBER, PhoneNumberFormat.INTERNATIONAL)).toEqual("+1 650-253-0000");
    expect(util.format(US_NUMBER, PhoneNumberFormat.E164)).toEqual("+16502530000");
    expect(util.format(US_NUMBER, PhoneNumberFormat.RFC3966)).toEqual("tel:+1-650-253-0000");
    // Seven digit numbers use the first format rule.
    expect(util.format(PhoneNumber.of(1, 2530000n), PhoneNumberFormat.NATIONAL)).toEqual("253-0000");
  });

  test('testFormatWithExtension', () => {
    let util = createTestUtil();
    let us = US_NUMBER.with({ extension: "1234" });
    expect(util.format(us, PhoneNumberFormat.NATIONAL)).toEqual("(650) 253-0000 ext. 1234");
    expect(util.format(us, PhoneNumberFormat.INTERNATIONAL)).toEqual("+1 650-253-0000 ext. 1234");
    expect(util.format(us, PhoneNumberFormat.RFC3966)).toEqual("tel:+1-650-253-0000;ext=1234");
    // Extensions are never included in E164.
    expect(util.format(us, PhoneNumberFormat.E164)).toEqual("+16502530000");
    // GB has its own preferred extension prefix.
    expect(util.format(GB_NUMBER.with({ extension: "456" }), PhoneNumberFormat.NATIONAL))
        .toEqual("020 8366 1177 x456");
  });

  test('testFormatGBNumber', () => {
    let util = createTestUtil();
    expect(util.format(GB_NUMBER, PhoneNumberFormat.NATIONAL)).toEqual("020 8366 1177");
    expect(util.format(GB_NUMBER, PhoneNumberFormat.INTERNATIONAL)).toEqual("+44 20 8366 1177");
    expect(util.format(GB_MOBILE, PhoneNumberFormat.NATIONAL)).toEqual("07400 123456");
    expect(util.format(PhoneNumber.of(44, 1212345678n), PhoneNumberFormat.NATIONAL))
        .toEqual("0121 234 5678");
  });

  test('testFormatWithLeadingZero', () => {
    let util = createTestUtil();
    expect(util.format(IT_NUMBER, PhoneNumberFormat.NATIONAL)).toEqual("02 3661 8300");
    expect(util.format(IT_NUMBER, PhoneNumberFormat.INTERNATIONAL)).toEqual("+39 02 3661 8300");
    expect(util.format(IT_NUMBER, PhoneNumberFormat.E164)).toEqual("+390236618300");
  });

  test('testFormatWithMobileToken', () => {
    let util = createTestUtil();
    expect(util.format(AR_MOBILE, PhoneNumberFormat.NATIONAL)).toEqual("011 15-2345-6789");
    expect(util.format(AR_MOBILE, PhoneNumberFormat.INTERNATIONAL)).toEqual("+54 9 11 2345-6789");
    expect(util.format(AR_NUMBER, PhoneNumberFormat.NATIONAL)).toEqual("011 2345-6789");
    expect(util.format(AR_NUMBER, PhoneNumberFormat.INTERNATIONAL)).toEqual("+54 11 2345-6789");
  });

  test('testFormatNationalPrefixRules', () => {
    let util = createTestUtil();
    expect(util.format(BR_MOBILE, PhoneNumberFormat.NATIONAL)).toEqual("(11) 98765-4321");
    expect(util.format(AU_NUMBER, PhoneNumberFormat.NATIONAL)).toEqual("(02) 1234 5678");
    expect(util.format(AU_MOBILE, PhoneNumberFormat.NATIONAL)).toEqual("0412 345 678");
    expect(util.format(AU_NUMBER, PhoneNumberFormat.RFC3966)).toEqual("tel:+61-2-1234-5678");
  });

  test('testFormatNonGeographicalNumber', () => {
    let util = createTestUtil();
    expect(util.format(INTERNATIONAL_TOLL_FREE, PhoneNumberFormat.INTERNATIONAL))
        .toEqual("+800 1234 5678");
    expect(util.format(INTERNATIONAL_TOLL_FREE, PhoneNumberFormat.E164)).toEqual("+80012345678");
  });

  test('testFormatUnknownCallingCode', () => {
    let util = createTestUtil();
    let unknown = PhoneNumber.of(999, 123n);
    expect(util.format(unknown, PhoneNumberFormat.INTERNATIONAL)).toEqual("123");
    expect(util.format(unknown, PhoneNumberFormat.NATIONAL)).toEqual("123");
    expect(util.format(unknown, PhoneNumberFormat.E164)).toEqual("+999123");
    // A number with no national number formats as its raw input.
    expect(util.format(PhoneNumber.of(1, 0n).with({ rawInput: "abc" }), PhoneNumberFormat.NATIONAL))
        .toEqual("abc");
  });

  test('testFormatWithCarrierCode', () => {
    let util = createTestUtil();
    expect(util.formatNationalNumberWithCarrierCode(BR_MOBILE, "15")).toEqual("0 15 (11) 98765-4321");
    // An empty carrier code is ignored.
    expect(util.formatNationalNumberWithCarrierCode(BR_MOBILE, "")).toEqual("(11) 98765-4321");
    // Regions without carrier code rules format nationally.
    expect(util.formatNationalNumberWithCarrierCode(US_NUMBER, "15")).toEqual("(650) 253-0000");

    let withCarrier = util.parseAndKeepRawInput("0 12 11 98765-4321", "BR");
    expect(util.formatNationalNumberWithPreferredCarrierCode(withCarrier, "15"))
        .toEqual("0 12 (11) 98765-4321");
    expect(util.formatNationalNumberWithPreferredCarrierCode(BR_MOBILE, "15"))
        .toEqual("0 15 (11) 98765-4321");
  });

  test('testFormatByPattern', () => {
    let util = createTestUtil();
    let formats = [userFormat("($1) $2-$3", "")];
    expect(util.formatByPattern(US_NUMBER, PhoneNumberFormat.NATIONAL, formats))
        .toEqual("(650) 253-0000");
    expect(util.formatByPattern(US_NUMBER, PhoneNumberFormat.INTERNATIONAL, formats))
        .toEqual("+1 (650) 253-0000");
    expect(util.formatByPattern(US_NUMBER, PhoneNumberFormat.NATIONAL, [userFormat("$1 $2-$3", "$NP ($FG)")]))
        .toEqual("1 (650) 253-0000");
    // Only the first of each placeholder in the rule is replaced.
    expect(util.formatByPattern(US_NUMBER, PhoneNumberFormat.NATIONAL, [userFormat("($1) $2-$3", "$NP$FG $FG")]))
        .toEqual("(1650 $FG) 253-0000");
    // No matching format leaves the number unformatted.
    expect(util.formatByPattern(PhoneNumber.of(1, 2530000n), PhoneNumberFormat.NATIONAL, formats))
        .toEqual("2530000");
  });

  test('testFormatOutOfCountryCallingNumber', () => {
    let util = createTestUtil();
    expect(util.formatOutOfCountryCallingNumber(US_NUMBER, "GB")).toEqual("00 1 650-253-0000");
    // The preferred prefix is used where there are several.
    expect(util.formatOutOfCountryCallingNumber(US_NUMBER, "AU")).toEqual("0011 1 650-253-0000");
    // A single prefix is used ahead of the preferred one.
    expect(util.formatOutOfCountryCallingNumber(GB_NUMBER, "AD")).toEqual("00 44 20 8366 1177");
    // No single or preferred prefix.
    expect(util.formatOutOfCountryCallingNumber(US_NUMBER, "BR")).toEqual("+1 650-253-0000");
    expect(util.formatOutOfCountryCallingNumber(US_NUMBER, "CA")).toEqual("1 (650) 253-0000");
    expect(util.formatOutOfCountryCallingNumber(US_NUMBER, "US")).toEqual("1 (650) 253-0000");
    expect(util.formatOutOfCountryCallingNumber(US_NUMBER, "ZZ")).toEqual("+1 650-253-0000");

    expect(util.formatOutOfCountryCallingNumber(GB_NUMBER, "US")).toEqual("011 44 20 8366 1177");
    expect(util.formatOutOfCountryCallingNumber(GB_NUMBER, "GB")).toEqual("020 8366 1177");
    expect(util.formatOutOfCountryCallingNumber(IT_NUMBER, "US")).toEqual("011 39 02 3661 8300");
    expect(util.formatOutOfCountryCallingNumber(GB_NUMBER.with({ extension: "1234" }), "US"))
        .toEqual("011 44 20 8366 1177 x1234");
  });

  test('testFormatOutOfCountryKeepingAlphaChars', () => {
    let util = createTestUtil();
    let vanity = util.parseAndKeepRawInput("1800 six-flag", "US");
    expect(util.formatOutOfCountryKeepingAlphaChars(vanity, "AU")).toEqual("0011 1 800 SIX-FLAG");
    expect(util.formatOutOfCountryKeepingAlphaChars(vanity, "GB")).toEqual("00 1 800 SIX-FLAG");
    expect(util.formatOutOfCountryKeepingAlphaChars(vanity, "AD")).toEqual("00 1 800 SIX-FLAG");
    expect(util.formatOutOfCountryKeepingAlphaChars(vanity, "CA")).toEqual("1 800 SIX-FLAG");
    // Without raw input this is the same as formatOutOfCountryCallingNumber().
    expect(util.formatOutOfCountryKeepingAlphaChars(US_NUMBER, "GB")).toEqual("00 1 650-253-0000");
  });

  test('testFormatInOriginalFormat', () => {
    let util = createTestUtil();
    let original = (text: string, region: string) =>
        util.formatInOriginalFormat(util.parseAndKeepRawInput(text, region), region);
    // The formatted digits would differ from those entered.
    expect(original("1800 six-flag", "US")).toEqual("1800 six-flag");
    expect(original("1 650 253 0000", "US")).toEqual("1 650-253-0000");
    expect(original("(650) 253-0000", "US")).toEqual("(650) 253-0000");
    expect(original("+44 20 8366 1177", "US")).toEqual("+44 20 8366 1177");
    expect(original("2083661177", "GB")).toEqual("20 8366 1177");
    expect(original("020 8366 1177", "GB")).toEqual("020 8366 1177");
    expect(original("011 44 20 8366 1177", "US")).toEqual("011 44 20 8366 1177");
    // No formatting rule matches the number.
    expect(original("+44 123", "GB")).toEqual("+44 123");
    expect(original("0 12 11 98765-4321", "BR")).toEqual("0 12 11 98765-4321");
    expect(util.formatInOriginalFormat(GB_NUMBER, "GB")).toEqual("020 8366 1177");
  });

  test('testFormatNumberForMobileDialing', () => {
    let util = createTestUtil();
    expect(util.formatNumberForMobileDialing(US_NUMBER, "US", true)).toEqual("+1 650-253-0000");
    expect(util.formatNumberForMobileDialing(US_NUMBER, "US", false)).toEqual("+16502530000");
    // Toll free numbers which cannot be dialled internationally.
    expect(util.formatNumberForMobileDialing(US_TOLL_FREE, "US", true)).toEqual("(800) 234-5678");
    expect(util.formatNumberForMobileDialing(US_TOLL_FREE, "US", false)).toEqual("8002345678");
    expect(util.formatNumberForMobileDialing(US_TOLL_FREE, "GB", true)).toEqual("");
    expect(util.formatNumberForMobileDialing(US_TOLL_FREE, "CA", true)).toEqual("");

    // Numbers which can be dialled internationally always are, even from their own region.
    expect(util.formatNumberForMobileDialing(GB_NUMBER, "GB", true)).toEqual("+44 20 8366 1177");
    expect(util.formatNumberForMobileDialing(GB_NUMBER, "GB", false)).toEqual("+442083661177");
    expect(util.formatNumberForMobileDialing(GB_NUMBER, "US", true)).toEqual("+44 20 8366 1177");
    // Extensions are dropped.
    expect(util.formatNumberForMobileDialing(GB_NUMBER.with({ extension: "12" }), "US", false))
        .toEqual("+442083661177");

    expect(util.formatNumberForMobileDialing(INTERNATIONAL_TOLL_FREE, "US", true)).toEqual("+800 1234 5678");
    expect(util.formatNumberForMobileDialing(INTERNATIONAL_TOLL_FREE, "001", false)).toEqual("+80012345678");

    expect(util.formatNumberForMobileDialing(PhoneNumber.of(999, 123n), "US", true)).toEqual("");
    expect(util.formatNumberForMobileDialing(PhoneNumber.of(999, 123n).with({ rawInput: "+999 123" }), "US", true))
        .toEqual("+999 123");
  });

  test('testFormatNumberForMobileDialingWithCarrierCode', () => {
    let util = createTestUtil();
    // Brazilian numbers need a carrier code to be dialled from a mobile within Brazil.
    let withCarrier = util.parseAndKeepRawInput("0 12 11 98765-4321", "BR");
    expect(util.formatNumberForMobileDialing(withCarrier, "BR", true)).toEqual("0 12 (11) 98765-4321");
    expect(util.formatNumberForMobileDialing(withCarrier, "BR", false)).toEqual("01211987654321");
    expect(util.formatNumberForMobileDialing(BR_MOBILE, "BR", true)).toEqual("");
    expect(util.formatNumberForMobileDialing(BR_MOBILE, "US", true)).toEqual("+55 11 98765-4321");

    // Colombian fixed-line numbers are dialled from a mobile with a carrier prefix.
    expect(util.formatNumberForMobileDialing(CO_FIXED_LINE, "CO", true)).toEqual("03 1 2345678");
    expect(util.formatNumberForMobileDialing(CO_FIXED_LINE, "CO", false)).toEqual("0312345678");
    expect(util.formatNumberForMobileDialing(CO_FIXED_LINE, "US", true)).toEqual("+57 1 2345678");
    expect(util.formatNumberForMobileDialing(CO_MOBILE, "CO", true)).toEqual("+57 321 1234567");
  });

  test('testChooseFormattingPattern', () => {
    let util = createTestUtil();
    let gb = util.getMetadataForRegion("GB");
    let formats = gb !== null ? gb.numberFormats : [];
    expect(util.chooseFormattingPatternForNumber(formats, "2083661177")?.format).toEqual("$1 $2 $3");
    expect(util.chooseFormattingPatternForNumber(formats, "7400123456")?.pattern)
        .toEqual("(\\d{4})(\\d{6})");
    expect(util.chooseFormattingPatternForNumber(formats, "123")).toBeNull();
  });
});
