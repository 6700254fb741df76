import {
  DateTimeException,
  DateTimeFormatter,
  DateTimeParseException,
  LocalDate,
  ResolverStyle,
} from '@js-joda/core';
import { matches } from 'class-validator';
import { AddressBookException } from '@app/address-book/exception/AddressBookException';

/**
 * Birthday of a contact, kept as a {@link LocalDate}.
 *
 * Accepts `DD.MM.YYYY` only. The strict resolver rejects dates that do not
 * exist in the calendar, e.g. `31.02.2024` or `29.02.2023`.
 */
export class Birthday {
  static readonly FORMATTER = DateTimeFormatter.ofPattern(
    'dd.MM.uuuu',
  ).withResolverStyle(ResolverStyle.STRICT);

  // 'uuuu' alone would also take five-digit years
  private static readonly PATTERN = /^\d{2}\.\d{2}\.\d{4}$/;

  private static readonly MIN_YEAR = 1;

  private readonly _date: LocalDate;

  constructor(text: string) {
    this._date = Birthday.parse(text);
  }

  static format(date: LocalDate): string {
    return date.format(Birthday.FORMATTER);
  }

  private static parse(text: string): LocalDate {
    const invalid = AddressBookException.Validation({
      message: `Invalid date: ${text}. Use DD.MM.YYYY`,
      parameter: { birthday: text },
    });

    if (!matches(text, Birthday.PATTERN)) {
      throw invalid;
    }

    let date: LocalDate;
    try {
      date = LocalDate.parse(text, Birthday.FORMATTER);
    } catch (e) {
      if (
        e instanceof DateTimeParseException ||
        e instanceof DateTimeException
      ) {
        throw invalid;
      }

      throw e;
    }

    // year 0 is a valid proleptic year for 'uuuu' but not a calendar year
    if (date.year() < Birthday.MIN_YEAR) {
      throw invalid;
    }

    return date;
  }

  get date(): LocalDate {
    return this._date;
  }

  toString(): string {
    return Birthday.format(this._date);
  }
}
