/*~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~
 Copyright (c) 2023, David Beaumont (https://github.com/hagbard).

 This program and the accompanying materials are made available under the terms of the
 Eclipse Public License v. 2.0 available at https://www.eclipse.org/legal/epl-2.0, or the
 Apache License, Version 2.0 available at https://www.apache.org/licenses/LICENSE-2.0.

 SPDX-License-Identifier: EPL-2.0 OR Apache-2.0
 ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~*/

import { z } from "zod";

/**
 * JSON schema for phone number metadata. Instances of `MetadataJson` are validated at load time
 * and turned into `PhoneMetadata` by `JsonMetadataSource`. Non-public API.
 *
 * The JSON structure mirrors the in-memory metadata model closely, except that some values
 * have territory level defaults which are pushed down into individual formats when loaded
 * (e.g. `nationalPrefixFormattingRule`).
 */

/**
 * Version information used to ensure that loaded metadata is compatible with the expectations
 * of the code using it.
 */
export const VersionJsonSchema = z.object({
  /**
   * Data structure major version, increased when incompatible changes are made to the JSON
   * structure (e.g. removing fields). Unknown major versions are rejected.
   */
  major: z.number().int().nonnegative(),
  /**
   * Data structure minor version, increased when backwards compatible changes are made. Code may
   * rely on a larger minor version than it was expecting, but not smaller.
   */
  minor: z.number().int().nonnegative(),
});

/** A number descriptor: a pattern plus the lengths a number of this type can have. */
export const NumberDescJsonSchema = z.object({
  /** Pattern matched against the whole national significant number. */
  nationalNumberPattern: z.string().min(1),
  /**
   * Possible lengths of the national significant number. If omitted, the lengths of the general
   * descriptor apply. A single entry of -1 means no number can match.
   */
  possibleLengths: z.array(z.number().int().min(-1)).optional(),
  /** Lengths which are only diallable locally (i.e. without an area code). */
  possibleLengthsLocalOnly: z.array(z.number().int().positive()).optional(),
  exampleNumber: z.string().regex(/^[0-9]+$/).optional(),
});

export const NumberFormatJsonSchema = z.object({
  /** Pattern matching the whole national significant number, with one group per block. */
  pattern: z.string().min(1),
  /** Replacement template for `pattern`, using `$1`, `$2` etc. */
  format: z.string().min(1),
  /** Patterns matched against the start of the number; the last one is the most specific. */
  leadingDigitsPatterns: z.array(z.string().min(1)).optional(),
  /** Overrides the territory default; an empty string means no national prefix is added. */
  nationalPrefixFormattingRule: z.string().optional(),
  nationalPrefixOptionalWhenFormatting: z.boolean().optional(),
  /** Overrides the territory default carrier code rule; uses `$CC` for the carrier code. */
  domesticCarrierCodeFormattingRule: z.string().optional(),
});

export const TerritoryJsonSchema = z.object({
  /** CLDR region code, or "001" for non-geographical entities. */
  id: z.string().regex(/^(?:[A-Z]{2}|001)$/),
  countryCode: z.number().int().min(1).max(999),
  mainCountryForCode: z.boolean().optional(),
  leadingDigits: z.string().min(1).optional(),
  internationalPrefix: z.string().optional(),
  preferredInternationalPrefix: z.string().optional(),
  nationalPrefix: z.string().optional(),
  preferredExtnPrefix: z.string().optional(),
  nationalPrefixForParsing: z.string().optional(),
  nationalPrefixTransformRule: z.string().optional(),
  nationalPrefixFormattingRule: z.string().optional(),
  nationalPrefixOptionalWhenFormatting: z.boolean().optional(),
  carrierCodeFormattingRule: z.string().optional(),
  leadingZeroPossible: z.boolean().optional(),
  mobileNumberPortableRegion: z.boolean().optional(),
  sameMobileAndFixedLinePattern: z.boolean().optional(),

  generalDesc: NumberDescJsonSchema.optional(),
  fixedLine: NumberDescJsonSchema.optional(),
  mobile: NumberDescJsonSchema.optional(),
  tollFree: NumberDescJsonSchema.optional(),
  premiumRate: NumberDescJsonSchema.optional(),
  sharedCost: NumberDescJsonSchema.optional(),
  personalNumber: NumberDescJsonSchema.optional(),
  voip: NumberDescJsonSchema.optional(),
  pager: NumberDescJsonSchema.optional(),
  uan: NumberDescJsonSchema.optional(),
  emergency: NumberDescJsonSchema.optional(),
  voicemail: NumberDescJsonSchema.optional(),
  noInternationalDialling: NumberDescJsonSchema.optional(),

  numberFormats: z.array(NumberFormatJsonSchema).optional(),
  /** When present and non-empty, used in preference to `numberFormats` for international format. */
  intlNumberFormats: z.array(NumberFormatJsonSchema).optional(),
});

/**
 * Other ways in which numbers for a calling code are commonly written. These are never used for
 * formatting, only to accept the grouping of numbers found in text.
 */
export const AlternateFormatsJsonSchema = z.object({
  countryCode: z.number().int().min(1).max(999),
  numberFormats: z.array(NumberFormatJsonSchema).min(1),
});

/**
 * Short numbers (e.g. emergency or directory services) of a region. These can only be dialled
 * within the region, and have no national prefix or calling code.
 */
export const ShortNumberTerritoryJsonSchema = z.object({
  id: z.string().regex(/^[A-Z]{2}$/),
  generalDesc: NumberDescJsonSchema,
  shortCode: NumberDescJsonSchema.optional(),
  tollFree: NumberDescJsonSchema.optional(),
  standardRate: NumberDescJsonSchema.optional(),
  premiumRate: NumberDescJsonSchema.optional(),
  emergency: NumberDescJsonSchema.optional(),
  /** Numbers which only work with some carriers. */
  carrierSpecific: NumberDescJsonSchema.optional(),
  smsServices: NumberDescJsonSchema.optional(),
});

/** Top-level metadata, covering any number of territories. */
export const MetadataJsonSchema = z.object({
  version: VersionJsonSchema,
  territories: z.array(TerritoryJsonSchema),
  alternateFormats: z.array(AlternateFormatsJsonSchema).optional(),
  shortNumbers: z.array(ShortNumberTerritoryJsonSchema).optional(),
});

export type VersionJson = z.infer<typeof VersionJsonSchema>;
export type NumberDescJson = z.infer<typeof NumberDescJsonSchema>;
export type NumberFormatJson = z.infer<typeof NumberFormatJsonSchema>;
export type TerritoryJson = z.infer<typeof TerritoryJsonSchema>;
export type AlternateFormatsJson = z.infer<typeof AlternateFormatsJsonSchema>;
export type ShortNumberTerritoryJson = z.infer<typeof ShortNumberTerritoryJsonSchema>;
export type MetadataJson = z.infer<typeof MetadataJsonSchema>;

/**
 * Prefix descriptions (geocoding, carrier names or time zones), keyed by language, then country
 * calling code, then digit prefix (which includes the calling code).
 *
 * ```
 * { "en": { "44": { "4420": "London", "44121": "Birmingham" } } }
 * ```
 *
 * Time zone data has no languages, and uses the pseudo-language "" as its only key.
 */
export const PrefixDataJsonSchema = z.record(
    z.string(),
    z.record(
        z.string().regex(/^[1-9][0-9]{0,2}$/),
        z.record(z.string().regex(/^[1-9][0-9]*$/), z.string())));

export type PrefixDataJson = z.infer<typeof PrefixDataJsonSchema>;
