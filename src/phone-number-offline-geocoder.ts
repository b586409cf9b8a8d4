/*~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~
 Copyright (c) 2023, David Beaumont (https://github.com/hagbard).

 This program and the accompanying materials are made available under the terms of the
 Eclipse Public License v. 2.0 available at https://www.eclipse.org/legal/epl-2.0, or the
 Apache License, Version 2.0 available at https://www.apache.org/licenses/LICENSE-2.0.

 SPDX-License-Identifier: EPL-2.0 OR Apache-2.0
 ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~*/

import { PhoneNumber } from "./phone-number.js";
import { PhoneNumberType } from "./match-results.js";
import { NumberClassifier } from "./number-classifier.js";
import { PhoneNumberUtil } from "./phone-number-util.js";
import { PrefixFileReader } from "./prefix-file-reader.js";
import { NumberParseError } from "./number-parse-error.js";

/**
 * Provides text descriptions of the locations of phone numbers (e.g. "Mountain View, CA" or
 * "Germany"), in a given language.
 *
 * Locations below the country level come from geocoding prefix data. Country names come from the
 * runtime's internationalization data (`Intl.DisplayNames`).
 */
export class PhoneNumberOfflineGeocoder {
  constructor(private readonly util: PhoneNumberUtil, private readonly prefixFileReader: PrefixFileReader) {}

  /**
   * Returns a description of the location of a number, or the empty string if the number is not
   * valid.
   *
   * If `userRegion` is given and the number belongs to a different region, only the name of the
   * number's country is returned. Non-geographical numbers (e.g. mobile numbers in most regions)
   * are also described only by their country.
   */
  getDescriptionForNumber(number: PhoneNumber, language: string, userRegion?: string): string {
    let numberType = this.util.getNumberType(number);
    if (numberType === PhoneNumberType.UNKNOWN) {
      return "";
    } else if (!NumberClassifier.isNumberTypeGeographical(numberType, number.getCountryCode())) {
      return this.getCountryNameForNumber(number, language);
    }
    return this.getDescriptionForValidNumber(number, language, userRegion);
  }

  /**
   * As `getDescriptionForNumber()`, but assuming the number is valid (and geographical). Results
   * for other numbers are unspecified.
   */
  getDescriptionForValidNumber(number: PhoneNumber, language: string, userRegion?: string): string {
    if (userRegion !== undefined) {
      let regionCode = this.util.getRegionCodeForNumber(number);
      if (userRegion !== regionCode) {
        return PhoneNumberOfflineGeocoder.getRegionDisplayName(regionCode, language);
      }
    }
    let areaDescription: string;
    let mobileToken = this.util.getCountryMobileToken(number.getCountryCode());
    let nationalNumber = this.util.getNationalSignificantNumber(number);
    if (mobileToken !== "" && nationalNumber.startsWith(mobileToken)) {
      // The mobile token is not part of the area code, so look up the number without it.
      let region = this.util.getRegionCodeForCountryCode(number.getCountryCode());
      let numberWithoutToken = this.parseOrDefault(nationalNumber.substring(mobileToken.length), region, number);
      areaDescription = this.prefixFileReader.getDescriptionForNumber(numberWithoutToken, language);
    } else {
      areaDescription = this.prefixFileReader.getDescriptionForNumber(number, language);
    }
    return areaDescription.length > 0 ? areaDescription : this.getCountryNameForNumber(number, language);
  }

  private parseOrDefault(text: string, region: string, defaultNumber: PhoneNumber): PhoneNumber {
    try {
      return this.util.parse(text, region);
    } catch (e) {
      if (e instanceof NumberParseError) {
        return defaultNumber;
      }
      throw e;
    }
  }

  /**
   * Returns the name of the country of a number. Where several regions share the calling code, the
   * number must be valid in exactly one of them, or the empty string is returned.
   */
  private getCountryNameForNumber(number: PhoneNumber, language: string): string {
    let regionCodes = this.util.getRegionCodesForCountryCode(number.getCountryCode());
    if (regionCodes.length === 1) {
      return PhoneNumberOfflineGeocoder.getRegionDisplayName(regionCodes[0], language);
    }
    let regionWhereNumberIsValid: string|null = null;
    for (let regionCode of regionCodes) {
      if (this.util.isValidNumberForRegion(number, regionCode)) {
        if (regionWhereNumberIsValid !== null) {
          // Valid in more than one region, so the country is ambiguous.
          return "";
        }
        regionWhereNumberIsValid = regionCode;
      }
    }
    return PhoneNumberOfflineGeocoder.getRegionDisplayName(regionWhereNumberIsValid, language);
  }

  private static getRegionDisplayName(regionCode: string|null, language: string): string {
    if (regionCode === null
        || regionCode === PhoneNumberUtil.UNKNOWN_REGION
        || regionCode === PhoneNumberUtil.REGION_CODE_FOR_NON_GEO_ENTITY) {
      return "";
    }
    try {
      // Underscore-separated tags (e.g. "en_US") are accepted as well as BCP 47 ones.
      let locales = Intl.DisplayNames.supportedLocalesOf([language.replace(/_/g, "-")]);
      if (locales.length === 0) {
        return "";
      }
      return new Intl.DisplayNames(locales, { type: "region" }).of(regionCode) ?? "";
    } catch (e) {
      // Not a well-formed language tag.
      if (e instanceof RangeError) {
        return "";
      }
      throw e;
    }
  }
}
