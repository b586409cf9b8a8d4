/*~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~
 Copyright (c) 2023, David Beaumont (https://github.com/hagbard).

 This program and the accompanying materials are made available under the terms of the
 Eclipse Public License v. 2.0 available at https://www.eclipse.org/legal/epl-2.0, or the
 Apache License, Version 2.0 available at https://www.apache.org/licenses/LICENSE-2.0.

 SPDX-License-Identifier: EPL-2.0 OR Apache-2.0
 ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~*/

import { JsonMetadataSource } from "../src/metadata-source.js";
import { EMPTY_NUMBER_DESC } from "../src/phone-metadata.js";
import { createTestMetadataSource, silentLogger } from "./test-util.js";

function sourceOf(territories: unknown[], major: number = 1): JsonMetadataSource {
  return JsonMetadataSource.fromJson({ version: { major, minor: 0 }, territories }, silentLogger);
}

describe("JsonMetadataSource", () => {
  test('testBadJson', () => {
    expect(() => JsonMetadataSource.create("not json", silentLogger))
        .toThrow(/Metadata is not valid JSON/);
    expect(() => sourceOf([{ id: "usa", countryCode: 1 }]))
        .toThrow(/does not match the expected schema/);
    expect(() => sourceOf([{ id: "US", countryCode: 1 }], 2))
        .toThrow(/incompatible data version/);
  });

  test('testBadTerritories', () => {
    expect(() => sourceOf([{ id: "US", countryCode: 1 }, { id: "US", countryCode: 1 }]))
        .toThrow("Duplicate metadata for region: US");
    expect(() => sourceOf([
      { id: "US", countryCode: 1, mainCountryForCode: true },
      { id: "CA", countryCode: 1, mainCountryForCode: true },
    ])).toThrow(/more than one main region/);
  });

  test('testRegionOrdering', () => {
    let source = createTestMetadataSource();
    expect(source.getRegionCodesForCountryCode(1)).toEqual(["US", "BS", "CA"]);
    expect(source.getRegionCodesForCountryCode(44)).toEqual(["GB"]);
    expect(source.getRegionCodesForCountryCode(800)).toEqual(["001"]);
    expect(source.getRegionCodesForCountryCode(999)).toEqual([]);

    expect(source.getSupportedCallingCodes()).toEqual(new Set([1, 44, 39, 54, 55, 61, 376, 57, 800]));
    expect(source.getSupportedRegions())
        .toEqual(new Set(["US", "BS", "CA", "GB", "IT", "AR", "BR", "AU", "AD", "CO"]));
    expect(source.getSupportedGlobalNetworkCallingCodes()).toEqual(new Set([800]));
  });

  test('testMetadataIsMemoized', () => {
    let source = createTestMetadataSource();
    let gb = source.getMetadataForRegion("GB");
    expect(gb).not.toBeNull();
    expect(source.getMetadataForRegion("GB")).toBe(gb);
    expect(source.getMetadataForRegion("ZZ")).toBeNull();
    expect(source.getMetadataForRegion("001")).toBeNull();

    let nonGeo = source.getMetadataForNonGeographicalRegion(800);
    expect(nonGeo?.id).toEqual("001");
    expect(source.getMetadataForNonGeographicalRegion(800)).toBe(nonGeo);
    expect(source.getMetadataForNonGeographicalRegion(44)).toBeNull();
  });

  test('testFormattingRulesAreResolved', () => {
    let source = createTestMetadataSource();
    let gb = source.getMetadataForRegion("GB");
    expect(gb?.numberFormats[0].nationalPrefixFormattingRule).toEqual("0$1");
    expect(gb?.nationalPrefixForParsing).toEqual("0");
    expect(gb?.preferredExtnPrefix).toEqual(" x");

    let br = source.getMetadataForRegion("BR");
    expect(br?.numberFormats[0].nationalPrefixFormattingRule).toEqual("($1)");
    expect(br?.numberFormats[0].domesticCarrierCodeFormattingRule).toEqual("0 $CC ($1)");

    // A format level rule overrides the territory default.
    let au = source.getMetadataForRegion("AU");
    expect(au?.numberFormats[0].nationalPrefixFormattingRule).toEqual("(0$1)");
    expect(au?.numberFormats[1].nationalPrefixFormattingRule).toEqual("0$1");

    let us = source.getMetadataForRegion("US");
    expect(us?.numberFormats[0].nationalPrefixFormattingRule).toEqual("");
    expect(us?.numberFormats[1].nationalPrefixOptionalWhenFormatting).toEqual(true);
    expect(us?.numberFormats[0].leadingDigitsPatterns).toEqual([]);
  });

  test('testNumberDescriptors', () => {
    let source = createTestMetadataSource();
    let us = source.getMetadataForRegion("US");
    expect(us?.sameMobileAndFixedLinePattern).toEqual(true);
    expect(us?.generalDesc.possibleLengthsLocalOnly).toEqual([7]);
    expect(us?.pager).toBe(EMPTY_NUMBER_DESC);
    expect(us?.tollFree.exampleNumber).toEqual("8002345678");

    let gb = source.getMetadataForRegion("GB");
    expect(gb?.sameMobileAndFixedLinePattern).toEqual(false);
    expect(gb?.generalDesc.possibleLengths).toEqual([7, 9, 10]);
    expect(gb?.sharedCost).toBe(EMPTY_NUMBER_DESC);

    let ad = source.getMetadataForRegion("AD");
    expect(ad?.generalDesc.nationalNumberPattern).toBeNull();
    expect(ad?.generalDesc.possibleLengths).toEqual([]);
    expect(ad?.fixedLine).toBe(EMPTY_NUMBER_DESC);
    expect(ad?.nationalPrefix).toBeNull();
    expect(ad?.preferredInternationalPrefix).toEqual("0~0");
    expect(ad?.sameMobileAndFixedLinePattern).toEqual(false);
  });

  test('testAlternateFormats', () => {
    let source = createTestMetadataSource();
    let formats = source.getAlternateFormatsForCountry(44);
    expect(formats?.length).toEqual(2);
    expect(formats?.[0].format).toEqual("$1 $2 $3");
    expect(formats?.[0].leadingDigitsPatterns).toEqual(["2"]);
    // No territory defaults are applied to alternate formats.
    expect(formats?.[0].nationalPrefixFormattingRule).toEqual("");
    expect(source.getAlternateFormatsForCountry(44)).toBe(formats);
    expect(source.getAlternateFormatsForCountry(1)).toBeNull();
  });

  test('testShortNumberMetadata', () => {
    let source = createTestMetadataSource();
    let gb = source.getShortNumberMetadataForRegion("GB");
    expect(gb?.emergency.nationalNumberPattern).toEqual("112|999");
    expect(gb?.premiumRate.exampleNumber).toEqual("118118");
    expect(gb?.standardRate).toBe(EMPTY_NUMBER_DESC);
    expect(source.getShortNumberMetadataForRegion("GB")).toBe(gb);
    expect(source.getShortNumberMetadataForRegion("AD")).toBeNull();
  });

  test('testDuplicateSupplementaryData', () => {
    let version = { major: 1, minor: 0 };
    let territories = [{ id: "GB", countryCode: 44 }];
    let format = { pattern: "(\\d{3})(\\d{3})", format: "$1 $2" };
    expect(() => JsonMetadataSource.fromJson({
      version,
      territories,
      alternateFormats: [{ countryCode: 44, numberFormats: [format] }, { countryCode: 44, numberFormats: [format] }],
    }, silentLogger)).toThrow("Duplicate alternate formats for calling code: 44");
    let shortNumbers = { id: "GB", generalDesc: { nationalNumberPattern: "999" } };
    expect(() => JsonMetadataSource.fromJson({
      version,
      territories,
      shortNumbers: [shortNumbers, shortNumbers],
    }, silentLogger)).toThrow("Duplicate short number metadata for region: GB");
  });
});
