/*~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~
 Copyright (c) 2023, David Beaumont (https://github.com/hagbard).

 This program and the accompanying materials are made available under the terms of the
 Eclipse Public License v. 2.0 available at https://www.eclipse.org/legal/epl-2.0, or the
 Apache License, Version 2.0 available at https://www.apache.org/licenses/LICENSE-2.0.

 SPDX-License-Identifier: EPL-2.0 OR Apache-2.0
 ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~*/

import { PhoneNumber } from "../src/phone-number.js";
import { ShortNumberCost, ShortNumberInfo } from "../src/short-number-info.js";
import { createTestMetadataSource, createTestUtil } from "./test-util.js";

const of = PhoneNumber.of;

function createShortNumberInfo(): ShortNumberInfo {
  return new ShortNumberInfo(createTestMetadataSource());
}

describe("ShortNumberInfo", () => {
  test('testIsPossibleShortNumber', () => {
    let info = createShortNumberInfo();
    expect(info.isPossibleShortNumberForRegion(of(1, 123456n), "US")).toEqual(true);
    // Canadian short numbers are at most 5 digits.
    expect(info.isPossibleShortNumberForRegion(of(1, 123456n), "CA")).toEqual(false);
    // The region must use the number's calling code.
    expect(info.isPossibleShortNumberForRegion(of(1, 123n), "GB")).toEqual(false);
    expect(info.isPossibleShortNumber(of(1, 123456n))).toEqual(true);
    expect(info.isPossibleShortNumber(of(44, 1234567n))).toEqual(false);
  });

  test('testIsValidShortNumber', () => {
    let info = createShortNumberInfo();
    expect(info.isValidShortNumberForRegion(of(1, 33669n), "US")).toEqual(true);
    expect(info.isValidShortNumberForRegion(of(1, 33669n), "CA")).toEqual(false);
    expect(info.isValidShortNumberForRegion(of(1, 611n), null)).toEqual(false);
    expect(info.isValidShortNumber(of(1, 611n))).toEqual(true);
    expect(info.isValidShortNumber(of(1, 999n))).toEqual(false);
    expect(info.isValidShortNumber(of(44, 118118n))).toEqual(true);
    expect(info.isValidShortNumber(of(44, 118n))).toEqual(false);
    // Calling codes without short number metadata.
    expect(info.isValidShortNumber(of(376, 112n))).toEqual(false);
  });

  test('testGetExpectedCostForRegion', () => {
    let info = createShortNumberInfo();
    expect(info.getExpectedCostForRegion(of(44, 118118n), "GB")).toEqual(ShortNumberCost.PREMIUM_RATE);
    expect(info.getExpectedCostForRegion(of(44, 100n), "GB")).toEqual(ShortNumberCost.TOLL_FREE);
    // Emergency numbers are free to call.
    expect(info.getExpectedCostForRegion(of(44, 999n), "GB")).toEqual(ShortNumberCost.TOLL_FREE);
    expect(info.getExpectedCostForRegion(of(44, 101n), "GB")).toEqual(ShortNumberCost.UNKNOWN_COST);
    expect(info.getExpectedCostForRegion(of(44, 1234567n), "GB")).toEqual(ShortNumberCost.UNKNOWN_COST);
    expect(info.getExpectedCostForRegion(of(44, 118118n), "US")).toEqual(ShortNumberCost.UNKNOWN_COST);
    expect(info.getExpectedCostForRegion(of(1, 211n), "US")).toEqual(ShortNumberCost.STANDARD_RATE);
    expect(info.getExpectedCostForRegion(of(1, 211n), "CA")).toEqual(ShortNumberCost.TOLL_FREE);
  });

  test('testGetExpectedCostForSharedCallingCode', () => {
    let info = createShortNumberInfo();
    // Toll free in every region sharing the code.
    expect(info.getExpectedCost(of(1, 911n))).toEqual(ShortNumberCost.TOLL_FREE);
    // Premium rate in the US, whatever it costs elsewhere.
    expect(info.getExpectedCost(of(1, 24123n))).toEqual(ShortNumberCost.PREMIUM_RATE);
    // Standard rate in the US and BS, but toll free in CA.
    expect(info.getExpectedCost(of(1, 211n))).toEqual(ShortNumberCost.STANDARD_RATE);
    // Standard rate in the US, but too long to be a short number in BS.
    expect(info.getExpectedCost(of(1, 25123n))).toEqual(ShortNumberCost.UNKNOWN_COST);
    expect(info.getExpectedCost(of(44, 118118n))).toEqual(ShortNumberCost.PREMIUM_RATE);
    expect(info.getExpectedCost(of(999, 112n))).toEqual(ShortNumberCost.UNKNOWN_COST);
  });

  test('testEmergencyNumbers', () => {
    let info = createShortNumberInfo();
    expect(info.isEmergencyNumber("999", "GB")).toEqual(true);
    expect(info.isEmergencyNumber("9 9 9", "GB")).toEqual(true);
    expect(info.isEmergencyNumber("9999", "GB")).toEqual(false);
    expect(info.connectsToEmergencyNumber("9999", "GB")).toEqual(true);
    // A calling code is never dialled before an emergency number.
    expect(info.connectsToEmergencyNumber("+999", "GB")).toEqual(false);
    expect(info.connectsToEmergencyNumber("\uFF0B999", "GB")).toEqual(false);
    expect(info.connectsToEmergencyNumber("999", "AD")).toEqual(false);
    // Extra digits stop an emergency call from connecting in Brazil.
    expect(info.connectsToEmergencyNumber("190", "BR")).toEqual(true);
    expect(info.connectsToEmergencyNumber("1901", "BR")).toEqual(false);
  });

  test('testCarrierSpecificAndSmsNumbers', () => {
    let info = createShortNumberInfo();
    expect(info.isCarrierSpecific(of(1, 611n))).toEqual(true);
    expect(info.isCarrierSpecific(of(1, 911n))).toEqual(false);
    expect(info.isCarrierSpecificForRegion(of(1, 611n), "US")).toEqual(true);
    expect(info.isCarrierSpecificForRegion(of(1, 611n), "CA")).toEqual(false);
    expect(info.isSmsServiceForRegion(of(1, 33669n), "US")).toEqual(true);
    expect(info.isSmsServiceForRegion(of(1, 611n), "US")).toEqual(false);
  });

  test('testExampleShortNumbers', () => {
    let info = createShortNumberInfo();
    expect(info.getExampleShortNumber("US")).toEqual("611");
    expect(info.getExampleShortNumber("AD")).toEqual("");
    expect(info.getExampleShortNumberForCost("GB", ShortNumberCost.PREMIUM_RATE)).toEqual("118118");
    expect(info.getExampleShortNumberForCost("GB", ShortNumberCost.STANDARD_RATE)).toEqual("");
    expect(info.getExampleShortNumberForCost("US", ShortNumberCost.UNKNOWN_COST)).toEqual("");
  });

  test('testParsedShortNumbers', () => {
    let util = createTestUtil();
    let info = util.getShortNumberInfo();
    expect(util.getShortNumberInfo()).toBe(info);
    expect(info.isValidShortNumberForRegion(util.parse("911", "US"), "US")).toEqual(true);
    expect(info.getExpectedCostForRegion(util.parse("118 118", "GB"), "GB"))
        .toEqual(ShortNumberCost.PREMIUM_RATE);
  });
});
