/*~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~
 Copyright (c) 2023, David Beaumont (https://github.com/hagbard).

 This program and the accompanying materials are made available under the terms of the
 Eclipse Public License v. 2.0 available at https://www.eclipse.org/legal/epl-2.0, or the
 Apache License, Version 2.0 available at https://www.apache.org/licenses/LICENSE-2.0.

 SPDX-License-Identifier: EPL-2.0 OR Apache-2.0
 ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~*/

import { PhoneNumber } from "./phone-number.js";
import { Logger, childLogger } from "./logger.js";

/**
 * A map from digit prefixes of phone numbers (including the calling code) to descriptions, such
 * as the place or carrier a range of numbers belongs to.
 *
 * Prefixes are held in a sorted array, with a parallel array of descriptions. A number is looked
 * up by truncating it to each possible prefix length in turn, longest first, and searching for
 * an exact match. This means that the most specific prefix always wins.
 *
 * ```
 * let map = PhonePrefixMap.create({ "1650": "California", "1650253": "Mountain View, CA" });
 * map.lookup(16502530000n);  // "Mountain View, CA"
 * map.lookup(16501234567n);  // "California"
 * ```
 */
export class PhonePrefixMap {
  /**
   * Creates a map from prefix/description pairs. Prefixes are strings of digits (which must not
   * start with zero, since they start with a calling code).
   */
  static create(
      entries: Readonly<Record<string, string>>,
      log: Logger = childLogger("prefix-map")): PhonePrefixMap {
    let pairs: Array<[number, string]> = Object.entries(entries)
        .map(([prefix, description]): [number, string] => [PhonePrefixMap.toPrefix(prefix), description]);
    pairs.sort((a, b) => a[0] - b[0]);
    let map = new PhonePrefixMap(pairs.map(p => p[0]), pairs.map(p => p[1]));
    log.debug({ entries: map.getEntryCount(), possibleLengths: map.possibleLengths }, "created prefix map");
    return map;
  }

  private static toPrefix(prefix: string): number {
    if (!/^[1-9][0-9]{0,14}$/.test(prefix)) {
      throw new Error(`Invalid phone number prefix: '${prefix}'`);
    }
    return Number(prefix);
  }

  // Possible lengths of prefixes, in descending order.
  private readonly possibleLengths: ReadonlyArray<number>;

  private constructor(
      private readonly prefixes: ReadonlyArray<number>,
      private readonly descriptions: ReadonlyArray<string>) {
    for (let i = 1; i < prefixes.length; i++) {
      if (prefixes[i] === prefixes[i - 1]) {
        throw new Error(`Duplicate phone number prefix: ${prefixes[i]}`);
      }
    }
    this.possibleLengths = [...new Set(prefixes.map(p => String(p).length))].sort((a, b) => b - a);
  }

  getEntryCount(): number {
    return this.prefixes.length;
  }

  /** Possible lengths of the prefixes in the map, longest first. */
  getPossibleLengths(): ReadonlyArray<number> {
    return this.possibleLengths;
  }

  /**
   * Returns the description of the longest prefix of the given number (a calling code followed by
   * the national significant number), or null if no prefix matches.
   */
  lookup(number: bigint): string|null {
    let numOfEntries = this.prefixes.length;
    if (numOfEntries === 0) {
      return null;
    }
    let phonePrefix = number.toString();
    let currentIndex = numOfEntries - 1;
    for (let possibleLength of this.possibleLengths) {
      if (phonePrefix.length > possibleLength) {
        phonePrefix = phonePrefix.substring(0, possibleLength);
      }
      let value = Number(phonePrefix);
      // Shorter prefixes are numerically smaller, so can only be at or before this index.
      currentIndex = this.binarySearch(0, currentIndex, value);
      if (currentIndex < 0) {
        return null;
      }
      if (this.prefixes[currentIndex] === value) {
        return this.descriptions[currentIndex];
      }
    }
    return null;
  }

  /** Looks up a phone number, using its calling code and national significant number. */
  lookupNumber(number: PhoneNumber): string|null {
    let nsn = "0".repeat(number.getNumberOfLeadingZeros()) + number.getNationalNumber().toString();
    return this.lookup(BigInt(`${number.getCountryCode()}${nsn}`));
  }

  /**
   * Searches for a value in the prefixes between the given (inclusive) indices. Returns the index
   * of the value if found, otherwise the index of the largest prefix less than the value (which
   * is -1 if every prefix is greater).
   */
  binarySearch(start: number, end: number, value: number): number {
    let current = 0;
    while (start <= end) {
      current = (start + end) >>> 1;
      let currentValue = this.prefixes[current];
      if (currentValue === value) {
        return current;
      } else if (currentValue > value) {
        current--;
        end = current;
      } else {
        start = current + 1;
      }
    }
    return current;
  }

  toString(): string {
    return this.prefixes.map((p, i) => `${p}|${this.descriptions[i]}\n`).join("");
  }
}
