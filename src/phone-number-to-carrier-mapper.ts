/*~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~
 Copyright (c) 2023, David Beaumont (https://github.com/hagbard).

 This program and the accompanying materials are made available under the terms of the
 Eclipse Public License v. 2.0 available at https://www.eclipse.org/legal/epl-2.0, or the
 Apache License, Version 2.0 available at https://www.apache.org/licenses/LICENSE-2.0.

 SPDX-License-Identifier: EPL-2.0 OR Apache-2.0
 ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~*/

import { PhoneNumber } from "./phone-number.js";
import { PhoneNumberType } from "./match-results.js";
import { PhoneNumberUtil } from "./phone-number-util.js";
import { PrefixFileReader } from "./prefix-file-reader.js";

/**
 * Provides the names of the carriers to which mobile phone numbers were originally allocated.
 *
 * Since numbers can be ported between carriers in many regions, the name is only a hint. Use
 * `getSafeDisplayName()` for names which are shown to users.
 */
export class PhoneNumberToCarrierMapper {
  constructor(private readonly util: PhoneNumberUtil, private readonly prefixFileReader: PrefixFileReader) {}

  /**
   * Returns the carrier name of a number, assuming it is valid, or the empty string if it is not
   * known.
   */
  getNameForValidNumber(number: PhoneNumber, language: string): string {
    return this.prefixFileReader.getDescriptionForNumber(number, language);
  }

  /**
   * Returns the carrier name of a mobile (or pager) number, or the empty string for other numbers,
   * invalid numbers and numbers with no carrier data.
   */
  getNameForNumber(number: PhoneNumber, language: string): string {
    return PhoneNumberToCarrierMapper.isMobile(this.util.getNumberType(number))
        ? this.getNameForValidNumber(number, language)
        : "";
  }

  /**
   * As `getNameForNumber()`, but returns the empty string for numbers of regions which support
   * mobile number portability, since the original carrier may no longer be correct.
   */
  getSafeDisplayName(number: PhoneNumber, language: string): string {
    let regionCode = this.util.getRegionCodeForNumber(number);
    if (regionCode !== null && this.util.isMobileNumberPortableRegion(regionCode)) {
      return "";
    }
    return this.getNameForNumber(number, language);
  }

  // Fixed-line numbers never have carrier data, but FIXED_LINE_OR_MOBILE numbers might.
  private static isMobile(numberType: PhoneNumberType): boolean {
    return numberType === PhoneNumberType.MOBILE
        || numberType === PhoneNumberType.FIXED_LINE_OR_MOBILE
        || numberType === PhoneNumberType.PAGER;
  }
}
