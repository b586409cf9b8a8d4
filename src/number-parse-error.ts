/*~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~
 Copyright (c) 2023, David Beaumont (https://github.com/hagbard).

 This program and the accompanying materials are made available under the terms of the
 Eclipse Public License v. 2.0 available at https://www.eclipse.org/legal/epl-2.0, or the
 Apache License, Version 2.0 available at https://www.apache.org/licenses/LICENSE-2.0.

 SPDX-License-Identifier: EPL-2.0 OR Apache-2.0
 ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~*/

/** The reasons parsing a phone number can fail. */
export enum ErrorType {
  /**
   * The number started with a plus sign (or IDD) followed by an unknown calling code, or no plus
   * sign was present and the default region was missing or unsupported.
   */
  INVALID_COUNTRY_CODE = "INVALID_COUNTRY_CODE",
  /** The input was empty or did not look like a phone number at all. */
  NOT_A_NUMBER = "NOT_A_NUMBER",
  /** An international dialling prefix was found, but too few digits followed it. */
  TOO_SHORT_AFTER_IDD = "TOO_SHORT_AFTER_IDD",
  /** The national significant number was too short to be a phone number. */
  TOO_SHORT_NSN = "TOO_SHORT_NSN",
  /** The input, or the national significant number, was too long to be a phone number. */
  TOO_LONG = "TOO_LONG",
}

/** Thrown when text cannot be parsed as a phone number. */
export class NumberParseError extends Error {
  constructor(readonly errorType: ErrorType, message: string) {
    super(message);
    this.name = "NumberParseError";
  }

  toString(): string {
    return `Error type: ${this.errorType}. ${this.message}`;
  }
}
