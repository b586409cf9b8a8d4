/*~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~
 Copyright (c) 2023, David Beaumont (https://github.com/hagbard).

 This program and the accompanying materials are made available under the terms of the
 Eclipse Public License v. 2.0 available at https://www.eclipse.org/legal/epl-2.0, or the
 Apache License, Version 2.0 available at https://www.apache.org/licenses/LICENSE-2.0.

 SPDX-License-Identifier: EPL-2.0 OR Apache-2.0
 ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~*/

import { AsYouTypeFormatter } from "../src/as-you-type-formatter.js";
import { createTestUtil } from "./test-util.js";

// Returns the output after each character.
function typeAll(formatter: AsYouTypeFormatter, text: string): string[] {
  return [...text].map(c => formatter.inputDigit(c));
}

describe("AsYouTypeFormatter", () => {
  test('testNationalNumber', () => {
    let formatter = createTestUtil().getAsYouTypeFormatter("US");
    expect(typeAll(formatter, "6502530000")).toEqual([
      "6",
      "65",
      "650",
      "650-2",
      "650-25",
      "650-253",
      "650-2530",
      // Too long for a local number, so the next format is used.
      "(650) 253-00",
      "(650) 253-000",
      "(650) 253-0000",
    ]);
  });

  test('testNumberWithPlusSign', () => {
    let formatter = createTestUtil().getAsYouTypeFormatter("US");
    expect(typeAll(formatter, "+16502530000")).toEqual([
      "+",
      "+1",
      "+1 6",
      "+1 65",
      "+1 650",
      "+1 650-2",
      "+1 650-25",
      "+1 650-253",
      "+1 650-253-0",
      "+1 650-253-00",
      "+1 650-253-000",
      "+1 650-253-0000",
    ]);
  });

  test('testNationalPrefix', () => {
    let formatter = createTestUtil().getAsYouTypeFormatter("GB");
    expect(typeAll(formatter, "02083661177")).toEqual([
      "0",
      "02",
      "020",
      "020 8",
      "020 83",
      "020 836",
      "020 8366",
      "020 8366 1",
      "020 8366 11",
      "020 8366 117",
      "020 8366 1177",
    ]);
  });

  test('testInternationalDiallingPrefix', () => {
    let formatter = createTestUtil().getAsYouTypeFormatter("US");
    expect(typeAll(formatter, "011442083661177")).toEqual([
      "0",
      "01",
      "011 ",
      "011 4",
      "011 44 ",
      "011 44 2",
      "011 44 20",
      "011 44 20 8",
      "011 44 20 83",
      "011 44 20 836",
      "011 44 20 8366",
      "011 44 20 8366 1",
      "011 44 20 8366 11",
      "011 44 20 8366 117",
      "011 44 20 8366 1177",
    ]);
  });

  test('testNonGeographicalNumber', () => {
    let formatter = createTestUtil().getAsYouTypeFormatter("US");
    let outputs = typeAll(formatter, "+80012345678");
    expect(outputs.slice(2, 5)).toEqual(["+80", "+800 ", "+800 1"]);
    expect(outputs[outputs.length - 1]).toEqual("+800 1234 5678");
  });

  test('testUnknownRegion', () => {
    let util = createTestUtil();
    // Nothing can be formatted without a calling code.
    expect(typeAll(util.getAsYouTypeFormatter("ZZ"), "6502530000").pop()).toEqual("6502530000");
    expect(typeAll(util.getAsYouTypeFormatter("ZZ"), "+16502530000").pop()).toEqual("+1 650-253-0000");
  });

  test('testFormattingCharactersStopFormatting', () => {
    let formatter = createTestUtil().getAsYouTypeFormatter("US");
    expect(typeAll(formatter, "650-253")).toEqual(["6", "65", "650", "650-", "650-2", "650-25", "650-253"]);
  });

  test('testFullWidthDigits', () => {
    let formatter = createTestUtil().getAsYouTypeFormatter("US");
    expect(typeAll(formatter, "\uFF16\uFF15\uFF10\uFF12").pop()).toEqual("650-2");
  });

  test('testClear', () => {
    let formatter = createTestUtil().getAsYouTypeFormatter("US");
    expect(typeAll(formatter, "+44208").pop()).toEqual("+44 20 8");
    formatter.clear();
    // Back to the formats of the formatter's own region.
    expect(typeAll(formatter, "6502530000").pop()).toEqual("(650) 253-0000");
  });

  test('testRememberedPosition', () => {
    let formatter = createTestUtil().getAsYouTypeFormatter("US");
    typeAll(formatter, "650");
    expect(formatter.inputDigitAndRememberPosition("2")).toEqual("650-2");
    expect(formatter.getRememberedPosition()).toEqual(5);
    expect(typeAll(formatter, "530000").pop()).toEqual("(650) 253-0000");
    // Still just after the "2", which has moved.
    expect(formatter.getRememberedPosition()).toEqual(7);

    formatter.clear();
    typeAll(formatter, "65");
    expect(formatter.inputDigitAndRememberPosition("-")).toEqual("65-");
    expect(formatter.getRememberedPosition()).toEqual(3);
  });
});
