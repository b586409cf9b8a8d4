/*~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~
 Copyright (c) 2023, David Beaumont (https://github.com/hagbard).

 This program and the accompanying materials are made available under the terms of the
 Eclipse Public License v. 2.0 available at https://www.eclipse.org/legal/epl-2.0, or the
 Apache License, Version 2.0 available at https://www.apache.org/licenses/LICENSE-2.0.

 SPDX-License-Identifier: EPL-2.0 OR Apache-2.0
 ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~*/

/** Types of phone numbers, as determined by classification against region metadata. */
export enum PhoneNumberType {
  FIXED_LINE = "FIXED_LINE",
  MOBILE = "MOBILE",
  /**
   * In some regions (e.g. the USA), it is impossible to distinguish between fixed-line and mobile
   * numbers by looking at the phone number itself.
   */
  FIXED_LINE_OR_MOBILE = "FIXED_LINE_OR_MOBILE",
  /** Freephone lines. */
  TOLL_FREE = "TOLL_FREE",
  PREMIUM_RATE = "PREMIUM_RATE",
  /**
   * The cost of this call is shared between the caller and the recipient, and is hence typically
   * less than premium rate calls.
   */
  SHARED_COST = "SHARED_COST",
  /** Voice over IP numbers. This includes TSoIP (Telephony Service over IP). */
  VOIP = "VOIP",
  /**
   * A personal number is associated with a particular person, and may be routed to either a
   * mobile or fixed line number.
   */
  PERSONAL_NUMBER = "PERSONAL_NUMBER",
  PAGER = "PAGER",
  /**
   * Used for "Universal Access Numbers" or "Company Numbers". They may be further routed to
   * specific offices, but allow one number to be used for a company.
   */
  UAN = "UAN",
  /** Used for "Voice Mail Access Numbers". */
  VOICEMAIL = "VOICEMAIL",
  /**
   * A phone number is of type UNKNOWN when it does not fit any of the known patterns for a
   * specific region.
   */
  UNKNOWN = "UNKNOWN",
}

/** Results enum for possible number (length) tests. */
export enum ValidationResult {
  /** The number length matches that of valid numbers for this region. */
  IS_POSSIBLE,
  /**
   * The number length matches that of local numbers for this region only (i.e. numbers that may
   * be able to be dialled within an area, but do not have all the information to be dialled from
   * anywhere inside or outside the country).
   */
  IS_POSSIBLE_LOCAL_ONLY,
  /** The number has an invalid country calling code. */
  INVALID_COUNTRY_CODE,
  /** The number is shorter than all valid numbers for this region. */
  TOO_SHORT,
  /**
   * The number is longer than the shortest valid numbers for this region, shorter than the
   * longest valid numbers for this region, and does not itself have a number length that matches
   * valid numbers for this region. This can also be returned in the case where there are no
   * numbers of the requested type in the region.
   */
  INVALID_LENGTH,
  /** The number is longer than all valid numbers for this region. */
  TOO_LONG,
}

/** Results enum for comparing two phone numbers (see `PhoneNumberUtil.isNumberMatch()`). */
export enum MatchType {
  /** At least one of the inputs could not be interpreted as a phone number. */
  NOT_A_NUMBER,
  /** The numbers differ (in calling code, national number or extension). */
  NO_MATCH,
  /**
   * The calling codes agree, or one is missing, and one national number is a suffix of the other
   * (e.g. "345 6789" and "+1 345 6789"). Typically caused by a missing area code.
   */
  SHORT_NSN_MATCH,
  /**
   * The national numbers (and extensions, where both are present) are the same, but only one of
   * the numbers has a calling code (e.g. "+1 345 6789" and "345 6789").
   */
  NSN_MATCH,
  /** The calling code, national number, leading zeros and extension all agree. */
  EXACT_MATCH,
}
