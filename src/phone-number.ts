/*~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~
 Copyright (c) 2023, David Beaumont (https://github.com/hagbard).

 This program and the accompanying materials are made available under the terms of the
 Eclipse Public License v. 2.0 available at https://www.eclipse.org/legal/epl-2.0, or the
 Apache License, Version 2.0 available at https://www.apache.org/licenses/LICENSE-2.0.

 SPDX-License-Identifier: EPL-2.0 OR Apache-2.0
 ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~*/

/** How the country calling code of a parsed number was determined. */
export enum CountryCodeSource {
  /** Not recorded (the number was not parsed with raw input retention). */
  UNSPECIFIED = "UNSPECIFIED",
  /** The input started with a plus sign (e.g. "+44 20 7031 3000"). */
  FROM_NUMBER_WITH_PLUS_SIGN = "FROM_NUMBER_WITH_PLUS_SIGN",
  /** The input started with the default region's international dialling prefix ("011 44 ..."). */
  FROM_NUMBER_WITH_IDD = "FROM_NUMBER_WITH_IDD",
  /** The input started with the default region's calling code, but no plus sign ("1 650 ..."). */
  FROM_NUMBER_WITHOUT_PLUS_SIGN = "FROM_NUMBER_WITHOUT_PLUS_SIGN",
  /** The calling code was taken from the default region. */
  FROM_DEFAULT_COUNTRY = "FROM_DEFAULT_COUNTRY",
}

/** The complete set of fields held by a `PhoneNumber`. */
export interface PhoneNumberFields {
  readonly countryCode: number;
  readonly nationalNumber: bigint;
  /**
   * Number of zeros preceding the numeric national number in the national significant number.
   * Zero for all numbers except those in regions where leading zeros are significant (e.g. Italy).
   */
  readonly numberOfLeadingZeros: number;
  readonly extension: string|null;
  readonly rawInput: string|null;
  readonly countryCodeSource: CountryCodeSource;
  readonly preferredDomesticCarrierCode: string|null;
}

/**
 * An immutable structured phone number, as produced by parsing.
 *
 * The national number is held numerically, so leading zeros of the national significant number
 * are recorded separately (see `getNumberOfLeadingZeros()`). Instances carry no reference to any
 * metadata and can be freely shared.
 *
 * New instances with modified fields are obtained via `with(...)`:
 *
 * ```
 * let number = PhoneNumber.of(44, 2083661177n);
 * let withExtension = number.with({ extension: "123" });
 * ```
 */
export class PhoneNumber {
  private static readonly EMPTY: PhoneNumberFields = {
    countryCode: 0,
    nationalNumber: 0n,
    numberOfLeadingZeros: 0,
    extension: null,
    rawInput: null,
    countryCodeSource: CountryCodeSource.UNSPECIFIED,
    preferredDomesticCarrierCode: null,
  };

  /** Returns a phone number with the given calling code and numeric national number. */
  static of(countryCode: number, nationalNumber: bigint): PhoneNumber {
    return new PhoneNumber({ ...PhoneNumber.EMPTY, countryCode, nationalNumber });
  }

  /**
   * Returns a phone number for the given national significant number (a string of ASCII digits),
   * recording any leading zeros. The final digit is never counted as a leading zero, so "0"
   * and "00" are held as zero with no (or one) leading zero respectively.
   */
  static fromNationalSignificantNumber(countryCode: number, nsn: string): PhoneNumber {
    if (!/^[0-9]+$/.test(nsn)) {
      throw new Error(`Invalid national significant number: '${nsn}'`);
    }
    return PhoneNumber.of(countryCode, BigInt(nsn))
        .with({ numberOfLeadingZeros: PhoneNumber.countLeadingZeros(nsn) });
  }

  /** Counts leading zeros of a national significant number, never counting the last digit. */
  static countLeadingZeros(nsn: string): number {
    let count = 0;
    while (count < nsn.length - 1 && nsn.charAt(count) === "0") {
      count++;
    }
    return count;
  }

  private constructor(private readonly fields: PhoneNumberFields) {
    if (!Number.isInteger(fields.countryCode) || fields.countryCode < 0) {
      throw new Error(`Invalid country calling code: ${fields.countryCode}`);
    }
    if (fields.nationalNumber < 0n) {
      throw new Error(`Invalid national number: ${fields.nationalNumber}`);
    }
  }

  /** Returns a copy of this number with the given fields replaced. */
  with(changes: Partial<PhoneNumberFields>): PhoneNumber {
    return new PhoneNumber({ ...this.fields, ...changes });
  }

  /** Country calling code, or 0 if none was resolved. */
  getCountryCode(): number {
    return this.fields.countryCode;
  }

  getNationalNumber(): bigint {
    return this.fields.nationalNumber;
  }

  /** Whether the national significant number starts with one or more zeros. */
  isItalianLeadingZero(): boolean {
    return this.fields.numberOfLeadingZeros > 0;
  }

  getNumberOfLeadingZeros(): number {
    return this.fields.numberOfLeadingZeros;
  }

  getExtension(): string|null {
    return this.fields.extension;
  }

  hasExtension(): boolean {
    return this.fields.extension !== null && this.fields.extension.length > 0;
  }

  getRawInput(): string|null {
    return this.fields.rawInput;
  }

  getCountryCodeSource(): CountryCodeSource {
    return this.fields.countryCodeSource;
  }

  getPreferredDomesticCarrierCode(): string|null {
    return this.fields.preferredDomesticCarrierCode;
  }

  /** Returns a copy of all the fields of this number. */
  toFields(): PhoneNumberFields {
    return { ...this.fields };
  }

  /** Whether every field of this number equals the corresponding field of the other. */
  exactlySameAs(other: PhoneNumber): boolean {
    let a = this.fields;
    let b = other.fields;
    return a.countryCode === b.countryCode
        && a.nationalNumber === b.nationalNumber
        && a.numberOfLeadingZeros === b.numberOfLeadingZeros
        && a.extension === b.extension
        && a.rawInput === b.rawInput
        && a.countryCodeSource === b.countryCodeSource
        && a.preferredDomesticCarrierCode === b.preferredDomesticCarrierCode;
  }

  equals(other: PhoneNumber|null|undefined): boolean {
    return other instanceof PhoneNumber && this.exactlySameAs(other);
  }

  toString(): string {
    let s = `Country Code: ${this.fields.countryCode} National Number: ${this.fields.nationalNumber}`;
    if (this.isItalianLeadingZero()) {
      s += ` Leading Zero(s): true Number of leading zeros: ${this.fields.numberOfLeadingZeros}`;
    }
    if (this.fields.extension !== null) {
      s += ` Extension: ${this.fields.extension}`;
    }
    if (this.fields.countryCodeSource !== CountryCodeSource.UNSPECIFIED) {
      s += ` Country Code Source: ${this.fields.countryCodeSource}`;
    }
    if (this.fields.preferredDomesticCarrierCode !== null) {
      s += ` Preferred Domestic Carrier Code: ${this.fields.preferredDomesticCarrierCode}`;
    }
    return s;
  }
}
