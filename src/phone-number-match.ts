/*~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~
 Copyright (c) 2023, David Beaumont (https://github.com/hagbard).

 This program and the accompanying materials are made available under the terms of the
 Eclipse Public License v. 2.0 available at https://www.eclipse.org/legal/epl-2.0, or the
 Apache License, Version 2.0 available at https://www.apache.org/licenses/LICENSE-2.0.

 SPDX-License-Identifier: EPL-2.0 OR Apache-2.0
 ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~*/

import { PhoneNumber } from "./phone-number.js";

/**
 * A phone number found in text by `PhoneNumberUtil.findNumbers()`, along with its position in the
 * text. The number holds no raw input, calling code source or carrier code. Immutable.
 */
export class PhoneNumberMatch {
  /**
   * @param start index of the first character of the match in the searched text
   * @param rawString the matched text
   */
  constructor(
      readonly start: number,
      readonly rawString: string,
      readonly number: PhoneNumber) {
    if (start < 0) {
      throw new Error(`Start index must be >= 0: ${start}`);
    }
  }

  /** Index just after the last character of the match in the searched text. */
  get end(): number {
    return this.start + this.rawString.length;
  }

  equals(other: PhoneNumberMatch): boolean {
    return this.start === other.start
        && this.rawString === other.rawString
        && this.number.exactlySameAs(other.number);
  }

  toString(): string {
    return `PhoneNumberMatch [${this.start},${this.end}) ${this.rawString}`;
  }
}
