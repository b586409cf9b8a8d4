/*~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~
 Copyright (c) 2023, David Beaumont (https://github.com/hagbard).

 This program and the accompanying materials are made available under the terms of the
 Eclipse Public License v. 2.0 available at https://www.eclipse.org/legal/epl-2.0, or the
 Apache License, Version 2.0 available at https://www.apache.org/licenses/LICENSE-2.0.

 SPDX-License-Identifier: EPL-2.0 OR Apache-2.0
 ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~*/

import {
    AlternateFormatsJson,
    MetadataJson,
    MetadataJsonSchema,
    NumberDescJson,
    NumberFormatJson,
    ShortNumberTerritoryJson,
    TerritoryJson,
    VersionJson } from "./metadata-json.js";
import {
    EMPTY_NUMBER_DESC,
    NumberDesc,
    NumberFormat,
    PhoneMetadata,
    ShortNumberMetadata } from "./phone-metadata.js";
import { childLogger, Logger } from "./logger.js";

/**
 * Supplies metadata to the phone number engine. Implementations must return the same metadata
 * instance for repeated calls with the same key, and must never modify metadata once returned.
 */
export interface MetadataSource {
  /** Returns metadata for a CLDR region code, or null if the region is not supported. */
  getMetadataForRegion(regionCode: string): PhoneMetadata|null;

  /**
   * Returns metadata for a non-geographical calling code (e.g. 800), or null if the calling code
   * is not supported or is not a non-geographical calling code.
   */
  getMetadataForNonGeographicalRegion(countryCallingCode: number): PhoneMetadata|null;

  /**
   * Returns the region codes for a calling code, main region first and the rest sorted. Returns
   * ["001"] for non-geographical calling codes, and the empty array for unknown calling codes.
   */
  getRegionCodesForCountryCode(countryCallingCode: number): ReadonlyArray<string>;

  /** All supported calling codes (geographical and non-geographical). */
  getSupportedCallingCodes(): ReadonlySet<number>;

  /** All supported CLDR region codes (excluding "001"). */
  getSupportedRegions(): ReadonlySet<string>;

  /** All supported non-geographical calling codes. */
  getSupportedGlobalNetworkCallingCodes(): ReadonlySet<number>;

  /**
   * Returns the alternate formats for a calling code, or null if there are none. These describe
   * other common groupings of numbers, and are only used when matching numbers in text.
   */
  getAlternateFormatsForCountry(countryCallingCode: number): ReadonlyArray<NumberFormat>|null;

  /** Returns the short number metadata for a region, or null if there is none. */
  getShortNumberMetadataForRegion(regionCode: string): ShortNumberMetadata|null;
}

/**
 * A metadata source backed by JSON data (see `MetadataJson`).
 *
 * Territories are indexed when the source is created, but `PhoneMetadata` instances are only
 * built on first access, and then memoized, so at most one instance exists per region code or
 * non-geographical calling code.
 */
export class JsonMetadataSource implements MetadataSource {
  // Data version which must be updated in client code when JSON structure changes.
  // Major (semantic) version number; if different, implies incompatible versions.
  private static readonly MAJOR_DATA_VERSION: number = 1;
  // Minor version number. A source can only use data with a minor version that's
  // greater than, or equal to, the one it expects.
  private static readonly MINOR_DATA_VERSION: number = 0;

  private static readonly REGION_CODE_FOR_NON_GEO_ENTITY: string = "001";

  /** Creates a metadata source from a JSON string. */
  static create(jsonString: string, log?: Logger): JsonMetadataSource {
    let json: unknown;
    try {
      json = JSON.parse(jsonString);
    } catch (e) {
      throw new Error(`Metadata is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
    }
    return JsonMetadataSource.fromJson(json, log);
  }

  /** Creates a metadata source from already parsed (but unvalidated) JSON data. */
  static fromJson(json: unknown, log: Logger = childLogger("metadata")): JsonMetadataSource {
    let result = MetadataJsonSchema.safeParse(json);
    if (!result.success) {
      throw new Error(`Metadata does not match the expected schema: ${result.error.message}`);
    }
    let metadata: MetadataJson = result.data;
    if (!JsonMetadataSource.dataVersionIsCompatible(metadata.version)) {
      throw new Error(
          `Metadata (version=${JSON.stringify(metadata.version)}) has incompatible data version`);
    }
    return new JsonMetadataSource(
        metadata.territories, metadata.alternateFormats ?? [], metadata.shortNumbers ?? [], log);
  }

  private static dataVersionIsCompatible(version: VersionJson): boolean {
    return version.major === JsonMetadataSource.MAJOR_DATA_VERSION
        && version.minor >= JsonMetadataSource.MINOR_DATA_VERSION;
  }

  private readonly regionTerritories: Map<string, TerritoryJson> = new Map();
  private readonly nonGeoTerritories: Map<number, TerritoryJson> = new Map();
  private readonly regionCodeMap: Map<number, ReadonlyArray<string>> = new Map();
  private readonly regionCache: Map<string, PhoneMetadata> = new Map();
  private readonly nonGeoCache: Map<number, PhoneMetadata> = new Map();
  private readonly alternateFormats: Map<number, AlternateFormatsJson> = new Map();
  private readonly alternateFormatsCache: Map<number, ReadonlyArray<NumberFormat>> = new Map();
  private readonly shortNumberTerritories: Map<string, ShortNumberTerritoryJson> = new Map();
  private readonly shortNumberCache: Map<string, ShortNumberMetadata> = new Map();

  private constructor(
      territories: ReadonlyArray<TerritoryJson>,
      alternateFormats: ReadonlyArray<AlternateFormatsJson>,
      shortNumbers: ReadonlyArray<ShortNumberTerritoryJson>,
      private readonly log: Logger) {
    let regionsByCode: Map<number, TerritoryJson[]> = new Map();
    for (let t of territories) {
      if (t.id === JsonMetadataSource.REGION_CODE_FOR_NON_GEO_ENTITY) {
        if (this.nonGeoTerritories.has(t.countryCode)) {
          throw new Error(`Duplicate metadata for non-geographical calling code: ${t.countryCode}`);
        }
        this.nonGeoTerritories.set(t.countryCode, t);
      } else {
        if (this.regionTerritories.has(t.id)) {
          throw new Error(`Duplicate metadata for region: ${t.id}`);
        }
        this.regionTerritories.set(t.id, t);
      }
      let list = regionsByCode.get(t.countryCode);
      if (list === undefined) {
        list = [];
        regionsByCode.set(t.countryCode, list);
      }
      list.push(t);
    }
    for (let [cc, list] of regionsByCode) {
      this.regionCodeMap.set(cc, JsonMetadataSource.orderRegions(cc, list));
    }
    for (let a of alternateFormats) {
      if (this.alternateFormats.has(a.countryCode)) {
        throw new Error(`Duplicate alternate formats for calling code: ${a.countryCode}`);
      }
      this.alternateFormats.set(a.countryCode, a);
    }
    for (let t of shortNumbers) {
      if (this.shortNumberTerritories.has(t.id)) {
        throw new Error(`Duplicate short number metadata for region: ${t.id}`);
      }
      this.shortNumberTerritories.set(t.id, t);
    }
    this.log.debug(
        {
          regions: this.regionTerritories.size,
          nonGeographical: this.nonGeoTerritories.size,
          alternateFormats: this.alternateFormats.size,
          shortNumberRegions: this.shortNumberTerritories.size,
        },
        "indexed phone number metadata");
  }

  // Region 001 is treated specially since it's the only region with more than one calling code,
  // so it cannot appear with any other region for the same calling code. Otherwise the main region
  // comes first and the rest are sorted alphabetically.
  private static orderRegions(cc: number, territories: ReadonlyArray<TerritoryJson>): string[] {
    let regions = territories.map(t => t.id);
    if (regions.length === 1) {
      return regions;
    }
    if (regions.includes(JsonMetadataSource.REGION_CODE_FOR_NON_GEO_ENTITY)) {
      throw new Error(`Region 001 must never appear with other region codes: ${regions}`);
    }
    let main = territories.filter(t => t.mainCountryForCode === true);
    if (main.length > 1) {
      throw new Error(`Calling code ${cc} has more than one main region: ${main.map(t => t.id)}`);
    }
    regions.sort();
    if (main.length === 1) {
      let idx = regions.indexOf(main[0].id);
      regions.splice(idx, 1);
      regions.unshift(main[0].id);
    }
    return regions;
  }

  getMetadataForRegion(regionCode: string): PhoneMetadata|null {
    let metadata = this.regionCache.get(regionCode);
    if (metadata === undefined) {
      let territory = this.regionTerritories.get(regionCode);
      if (territory === undefined) {
        return null;
      }
      metadata = JsonMetadataSource.toPhoneMetadata(territory);
      this.regionCache.set(regionCode, metadata);
      this.log.debug({ region: regionCode }, "loaded region metadata");
    }
    return metadata;
  }

  getMetadataForNonGeographicalRegion(countryCallingCode: number): PhoneMetadata|null {
    let metadata = this.nonGeoCache.get(countryCallingCode);
    if (metadata === undefined) {
      let territory = this.nonGeoTerritories.get(countryCallingCode);
      if (territory === undefined) {
        return null;
      }
      metadata = JsonMetadataSource.toPhoneMetadata(territory);
      this.nonGeoCache.set(countryCallingCode, metadata);
      this.log.debug({ callingCode: countryCallingCode }, "loaded non-geographical metadata");
    }
    return metadata;
  }

  getAlternateFormatsForCountry(countryCallingCode: number): ReadonlyArray<NumberFormat>|null {
    let formats = this.alternateFormatsCache.get(countryCallingCode);
    if (formats === undefined) {
      let json = this.alternateFormats.get(countryCallingCode);
      if (json === undefined) {
        return null;
      }
      // Alternate formats are only used to split numbers into groups, so no territory defaults apply.
      let defaults: FormatDefaults = {
        nationalPrefixFormattingRule: "",
        nationalPrefixOptionalWhenFormatting: false,
        domesticCarrierCodeFormattingRule: "",
        nationalPrefix: null,
      };
      formats = Object.freeze(json.numberFormats.map(f => JsonMetadataSource.toNumberFormat(f, defaults)));
      this.alternateFormatsCache.set(countryCallingCode, formats);
    }
    return formats;
  }

  getShortNumberMetadataForRegion(regionCode: string): ShortNumberMetadata|null {
    let metadata = this.shortNumberCache.get(regionCode);
    if (metadata === undefined) {
      let territory = this.shortNumberTerritories.get(regionCode);
      if (territory === undefined) {
        return null;
      }
      metadata = JsonMetadataSource.toShortNumberMetadata(territory);
      this.shortNumberCache.set(regionCode, metadata);
      this.log.debug({ region: regionCode }, "loaded short number metadata");
    }
    return metadata;
  }

  getRegionCodesForCountryCode(countryCallingCode: number): ReadonlyArray<string> {
    return this.regionCodeMap.get(countryCallingCode) ?? [];
  }

  getSupportedCallingCodes(): ReadonlySet<number> {
    return new Set(this.regionCodeMap.keys());
  }

  getSupportedRegions(): ReadonlySet<string> {
    return new Set(this.regionTerritories.keys());
  }

  getSupportedGlobalNetworkCallingCodes(): ReadonlySet<number> {
    return new Set(this.nonGeoTerritories.keys());
  }

  private static toPhoneMetadata(t: TerritoryJson): PhoneMetadata {
    let nationalPrefix = JsonMetadataSource.nonEmpty(t.nationalPrefix);
    let generalDesc: NumberDesc = t.generalDesc !== undefined
        ? JsonMetadataSource.toNumberDesc(t.generalDesc)
        // No general descriptor means only length based validation is possible.
        : Object.freeze({
            nationalNumberPattern: null,
            possibleLengths: [],
            possibleLengthsLocalOnly: [],
            exampleNumber: null,
          });
    let typeDesc = (json: NumberDescJson|undefined): NumberDesc =>
        json !== undefined ? JsonMetadataSource.toNumberDesc(json) : EMPTY_NUMBER_DESC;
    let fixedLine = typeDesc(t.fixedLine);
    let mobile = typeDesc(t.mobile);
    let formatDefaults: FormatDefaults = {
      nationalPrefixFormattingRule:
          JsonMetadataSource.resolveRule(t.nationalPrefixFormattingRule, nationalPrefix),
      nationalPrefixOptionalWhenFormatting: t.nationalPrefixOptionalWhenFormatting ?? false,
      domesticCarrierCodeFormattingRule:
          JsonMetadataSource.resolveRule(t.carrierCodeFormattingRule, nationalPrefix),
      nationalPrefix,
    };
    let toFormat = (f: NumberFormatJson) => JsonMetadataSource.toNumberFormat(f, formatDefaults);
    return Object.freeze({
      id: t.id,
      countryCode: t.countryCode,
      internationalPrefix: JsonMetadataSource.nonEmpty(t.internationalPrefix),
      preferredInternationalPrefix: JsonMetadataSource.nonEmpty(t.preferredInternationalPrefix),
      nationalPrefix,
      preferredExtnPrefix: JsonMetadataSource.nonEmpty(t.preferredExtnPrefix),
      nationalPrefixForParsing:
          JsonMetadataSource.nonEmpty(t.nationalPrefixForParsing) ?? nationalPrefix,
      nationalPrefixTransformRule: JsonMetadataSource.nonEmpty(t.nationalPrefixTransformRule),
      sameMobileAndFixedLinePattern: t.sameMobileAndFixedLinePattern
          ?? (fixedLine.nationalNumberPattern !== null
              && fixedLine.nationalNumberPattern === mobile.nationalNumberPattern),
      numberFormats: Object.freeze((t.numberFormats ?? []).map(toFormat)),
      intlNumberFormats: Object.freeze((t.intlNumberFormats ?? []).map(toFormat)),
      mainCountryForCode: t.mainCountryForCode ?? false,
      leadingDigits: JsonMetadataSource.nonEmpty(t.leadingDigits),
      leadingZeroPossible: t.leadingZeroPossible ?? false,
      mobileNumberPortableRegion: t.mobileNumberPortableRegion ?? false,
      generalDesc,
      fixedLine,
      mobile,
      tollFree: typeDesc(t.tollFree),
      premiumRate: typeDesc(t.premiumRate),
      sharedCost: typeDesc(t.sharedCost),
      personalNumber: typeDesc(t.personalNumber),
      voip: typeDesc(t.voip),
      pager: typeDesc(t.pager),
      uan: typeDesc(t.uan),
      emergency: typeDesc(t.emergency),
      voicemail: typeDesc(t.voicemail),
      noInternationalDialling: typeDesc(t.noInternationalDialling),
    });
  }

  private static toShortNumberMetadata(t: ShortNumberTerritoryJson): ShortNumberMetadata {
    let typeDesc = (json: NumberDescJson|undefined): NumberDesc =>
        json !== undefined ? JsonMetadataSource.toNumberDesc(json) : EMPTY_NUMBER_DESC;
    return Object.freeze({
      id: t.id,
      generalDesc: JsonMetadataSource.toNumberDesc(t.generalDesc),
      shortCode: typeDesc(t.shortCode),
      tollFree: typeDesc(t.tollFree),
      standardRate: typeDesc(t.standardRate),
      premiumRate: typeDesc(t.premiumRate),
      emergency: typeDesc(t.emergency),
      carrierSpecific: typeDesc(t.carrierSpecific),
      smsServices: typeDesc(t.smsServices),
    });
  }

  private static toNumberDesc(json: NumberDescJson): NumberDesc {
    return Object.freeze({
      nationalNumberPattern: json.nationalNumberPattern,
      possibleLengths: Object.freeze(JsonMetadataSource.sortedUnique(json.possibleLengths ?? [])),
      possibleLengthsLocalOnly:
          Object.freeze(JsonMetadataSource.sortedUnique(json.possibleLengthsLocalOnly ?? [])),
      exampleNumber: json.exampleNumber ?? null,
    });
  }

  private static toNumberFormat(json: NumberFormatJson, defaults: FormatDefaults): NumberFormat {
    let nationalPrefixFormattingRule = json.nationalPrefixFormattingRule !== undefined
        ? JsonMetadataSource.resolveRule(json.nationalPrefixFormattingRule, defaults.nationalPrefix)
        : defaults.nationalPrefixFormattingRule;
    let domesticCarrierCodeFormattingRule = json.domesticCarrierCodeFormattingRule !== undefined
        ? JsonMetadataSource.resolveRule(
            json.domesticCarrierCodeFormattingRule, defaults.nationalPrefix)
        : defaults.domesticCarrierCodeFormattingRule;
    return Object.freeze({
      pattern: json.pattern,
      format: json.format,
      leadingDigitsPatterns: Object.freeze([...(json.leadingDigitsPatterns ?? [])]),
      nationalPrefixFormattingRule,
      nationalPrefixOptionalWhenFormatting:
          json.nationalPrefixOptionalWhenFormatting ?? defaults.nationalPrefixOptionalWhenFormatting,
      domesticCarrierCodeFormattingRule,
    });
  }

  // Replaces "$NP" with the national prefix and "$FG" with "$1" (the first group), leaving any
  // "$CC" placeholder for carrier codes in place.
  private static resolveRule(rule: string|undefined, nationalPrefix: string|null): string {
    if (rule === undefined || rule.length === 0) {
      return "";
    }
    return rule.replace("$NP", () => nationalPrefix ?? "").replace("$FG", () => "$1");
  }

  private static sortedUnique(values: ReadonlyArray<number>): number[] {
    return [...new Set(values)].sort((a, b) => a - b);
  }

  private static nonEmpty(s: string|undefined): string|null {
    return s !== undefined && s.length > 0 ? s : null;
  }
}

interface FormatDefaults {
  readonly nationalPrefixFormattingRule: string;
  readonly nationalPrefixOptionalWhenFormatting: boolean;
  readonly domesticCarrierCodeFormattingRule: string;
  readonly nationalPrefix: string|null;
}
