/*~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~
 Copyright (c) 2023, David Beaumont (https://github.com/hagbard).

 This program and the accompanying materials are made available under the terms of the
 Eclipse Public License v. 2.0 available at https://www.eclipse.org/legal/epl-2.0, or the
 Apache License, Version 2.0 available at https://www.apache.org/licenses/LICENSE-2.0.

 SPDX-License-Identifier: EPL-2.0 OR Apache-2.0
 ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~*/

import { CountryCodeSource, PhoneNumber } from "../src/phone-number.js";

describe("PhoneNumber", () => {
  test('testOf', () => {
    let number = PhoneNumber.of(44, 2083661177n);
    expect(number.getCountryCode()).toEqual(44);
    expect(number.getNationalNumber()).toEqual(2083661177n);
    expect(number.getNumberOfLeadingZeros()).toEqual(0);
    expect(number.isItalianLeadingZero()).toEqual(false);
    expect(number.getExtension()).toBeNull();
    expect(number.hasExtension()).toEqual(false);
    expect(number.getRawInput()).toBeNull();
    expect(number.getCountryCodeSource()).toEqual(CountryCodeSource.UNSPECIFIED);
    expect(number.getPreferredDomesticCarrierCode()).toBeNull();
  });

  test('testFromNationalSignificantNumber', () => {
    let number = PhoneNumber.fromNationalSignificantNumber(39, "0236618300");
    expect(number.getNationalNumber()).toEqual(236618300n);
    expect(number.getNumberOfLeadingZeros()).toEqual(1);
    expect(number.isItalianLeadingZero()).toEqual(true);

    // The last digit is never counted as a leading zero.
    expect(PhoneNumber.fromNationalSignificantNumber(39, "0").getNumberOfLeadingZeros()).toEqual(0);
    expect(PhoneNumber.fromNationalSignificantNumber(39, "00").getNumberOfLeadingZeros()).toEqual(1);
    expect(PhoneNumber.fromNationalSignificantNumber(39, "00").getNationalNumber()).toEqual(0n);
    expect(PhoneNumber.fromNationalSignificantNumber(39, "0012").getNumberOfLeadingZeros()).toEqual(2);
  });

  test('testBadArguments', () => {
    expect(() => PhoneNumber.fromNationalSignificantNumber(1, "12a"))
        .toThrow("Invalid national significant number: '12a'");
    expect(() => PhoneNumber.fromNationalSignificantNumber(1, "")).toThrow();
    expect(() => PhoneNumber.of(-1, 123n)).toThrow("Invalid country calling code: -1");
    expect(() => PhoneNumber.of(1, -5n)).toThrow("Invalid national number: -5");
  });

  test('testWithIsImmutable', () => {
    let number = PhoneNumber.of(1, 6502530000n);
    let withExtension = number.with({ extension: "1234" });
    expect(number.getExtension()).toBeNull();
    expect(withExtension.getExtension()).toEqual("1234");
    expect(withExtension.hasExtension()).toEqual(true);
    expect(withExtension.getNationalNumber()).toEqual(6502530000n);
    // An empty extension is not an extension.
    expect(number.with({ extension: "" }).hasExtension()).toEqual(false);
  });

  test('testEquality', () => {
    let number = PhoneNumber.of(1, 6502530000n);
    expect(number.equals(PhoneNumber.of(1, 6502530000n))).toEqual(true);
    expect(number.exactlySameAs(PhoneNumber.of(1, 6502530000n))).toEqual(true);
    expect(number.equals(PhoneNumber.of(1, 6502530001n))).toEqual(false);
    expect(number.equals(number.with({ rawInput: "650 253 0000" }))).toEqual(false);
    expect(number.equals(number.with({ countryCodeSource: CountryCodeSource.FROM_DEFAULT_COUNTRY })))
        .toEqual(false);
    expect(number.equals(number.with({ numberOfLeadingZeros: 1 }))).toEqual(false);
    expect(number.equals(null)).toEqual(false);
    expect(number.equals(undefined)).toEqual(false);
  });

  test('testToFields', () => {
    let fields = PhoneNumber.of(44, 7400123456n).with({ extension: "9" }).toFields();
    expect(fields).toEqual({
      countryCode: 44,
      nationalNumber: 7400123456n,
      numberOfLeadingZeros: 0,
      extension: "9",
      rawInput: null,
      countryCodeSource: CountryCodeSource.UNSPECIFIED,
      preferredDomesticCarrierCode: null,
    });
  });

  test('testToString', () => {
    expect(PhoneNumber.of(1, 6502530000n).toString())
        .toEqual("Country Code: 1 National Number: 6502530000");
    expect(PhoneNumber.fromNationalSignificantNumber(39, "0236618300").toString())
        .toEqual("Country Code: 39 National Number: 236618300 Leading Zero(s): true Number of leading zeros: 1");
    let full = PhoneNumber.of(55, 11987654321n).with({
      extension: "12",
      countryCodeSource: CountryCodeSource.FROM_DEFAULT_COUNTRY,
      preferredDomesticCarrierCode: "15",
    });
    expect(full.toString()).toEqual(
        "Country Code: 55 National Number: 11987654321 Extension: 12"
        + " Country Code Source: FROM_DEFAULT_COUNTRY Preferred Domestic Carrier Code: 15");
  });
});
