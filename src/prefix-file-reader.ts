/*~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~
 Copyright (c) 2023, David Beaumont (https://github.com/hagbard).

 This program and the accompanying materials are made available under the terms of the
 Eclipse Public License v. 2.0 available at https://www.eclipse.org/legal/epl-2.0, or the
 Apache License, Version 2.0 available at https://www.apache.org/licenses/LICENSE-2.0.

 SPDX-License-Identifier: EPL-2.0 OR Apache-2.0
 ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~*/

import { PhoneNumber } from "./phone-number.js";
import { PhonePrefixMap } from "./phone-prefix-map.js";
import { PrefixDataJson, PrefixDataJsonSchema } from "./metadata-json.js";
import { Logger, childLogger } from "./logger.js";

/**
 * Reads prefix description data (see `PrefixDataJson`) and provides the `PhonePrefixMap` for each
 * language and calling code, building each map when it is first needed.
 *
 * Languages are BCP 47 tags (e.g. "en" or "zh-Hant"). A map for the full tag is used if present,
 * otherwise the map for its primary language subtag.
 */
export class PrefixFileReader {
  /** Creates a reader from a JSON string. */
  static create(jsonString: string, log?: Logger): PrefixFileReader {
    let json: unknown;
    try {
      json = JSON.parse(jsonString);
    } catch (e) {
      throw new Error(`Prefix data is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
    }
    return PrefixFileReader.fromJson(json, log);
  }

  /** Creates a reader from already parsed (but unvalidated) JSON data. */
  static fromJson(json: unknown, log: Logger = childLogger("prefix-data")): PrefixFileReader {
    let result = PrefixDataJsonSchema.safeParse(json);
    if (!result.success) {
      throw new Error(`Prefix data does not match the expected schema: ${result.error.message}`);
    }
    return new PrefixFileReader(result.data, log);
  }

  // Keyed by "<language>/<calling code>".
  private readonly mapCache: Map<string, PhonePrefixMap|null> = new Map();

  private constructor(private readonly data: PrefixDataJson, private readonly log: Logger) {}

  /** Returns the languages for which data exists. */
  getLanguages(): ReadonlySet<string> {
    return new Set(Object.keys(this.data));
  }

  /**
   * Returns the prefix map for a language and calling code, or null if there is no data for that
   * combination.
   */
  getPrefixMap(language: string, countryCallingCode: number): PhonePrefixMap|null {
    for (let lang of PrefixFileReader.languageCandidates(language)) {
      let map = this.getPrefixMapForExactLanguage(lang, countryCallingCode);
      if (map !== null) {
        return map;
      }
    }
    return null;
  }

  private getPrefixMapForExactLanguage(language: string, countryCallingCode: number): PhonePrefixMap|null {
    let key = `${language}/${countryCallingCode}`;
    let map = this.mapCache.get(key);
    if (map === undefined) {
      let entries = Object.hasOwn(this.data, language) ? this.data[language][String(countryCallingCode)] : undefined;
      map = entries !== undefined ? PhonePrefixMap.create(entries, this.log) : null;
      this.mapCache.set(key, map);
    }
    return map;
  }

  /**
   * Returns the description of a number in the given language, or the empty string if there is
   * none. Descriptions in English are used when none exist in the requested language, unless the
   * language is Chinese, Japanese or Korean (where an English name would not be expected).
   */
  getDescriptionForNumber(number: PhoneNumber, language: string): string {
    let countryCallingCode = number.getCountryCode();
    let description = this.getPrefixMap(language, countryCallingCode)?.lookupNumber(number) ?? null;
    if ((description === null || description.length === 0) && PrefixFileReader.mayFallBackToEnglish(language)) {
      description = this.getPrefixMap("en", countryCallingCode)?.lookupNumber(number) ?? null;
    }
    return description ?? "";
  }

  private static mayFallBackToEnglish(language: string): boolean {
    let primary = PrefixFileReader.primaryLanguage(language);
    return primary !== "zh" && primary !== "ja" && primary !== "ko";
  }

  private static languageCandidates(language: string): string[] {
    let primary = PrefixFileReader.primaryLanguage(language);
    return primary !== language ? [language, primary] : [language];
  }

  private static primaryLanguage(language: string): string {
    let separator = language.search(/[-_]/);
    return separator >= 0 ? language.substring(0, separator) : language;
  }
}
