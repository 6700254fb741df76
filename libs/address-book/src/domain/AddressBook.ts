import {
  ChronoUnit,
  DayOfWeek,
  LocalDate,
  TemporalAdjusters,
} from '@js-joda/core';
import { ContactRecord } from '@app/address-book/domain/ContactRecord';
import { Birthday } from '@app/address-book/domain/Birthday';
import { UpcomingBirthday } from '@app/address-book/domain/UpcomingBirthday';

export class AddressBook {
  static readonly DEFAULT_WINDOW_DAYS = 7;

  private readonly records = new Map<string, ContactRecord>();

  /**
   * Stores the record under its name. An existing record with the same name
   * is replaced as a whole, nothing is merged.
   */
  addRecord(record: ContactRecord): void {
    this.records.set(record.name, record);
  }

  find(name: string): ContactRecord | undefined {
    return this.records.get(name);
  }

  delete(name: string): void {
    this.records.delete(name);
  }

  get size(): number {
    return this.records.size;
  }

  getRecords(): ContactRecord[] {
    return [...this.records.values()];
  }

  /**
   * Contacts whose next birthday, moved to Monday when it falls on a
   * weekend, is between `today` and `today + windowDays` inclusive.
   *
   * The window is checked against the moved date: a Saturday birthday on the
   * last day of the window is dropped because its Monday lies outside.
   * A February 29 birthday is celebrated on February 28 in common years.
   */
  upcomingBirthdays(
    windowDays = AddressBook.DEFAULT_WINDOW_DAYS,
    today: LocalDate = LocalDate.now(),
  ): UpcomingBirthday[] {
    const upcoming: UpcomingBirthday[] = [];

    for (const record of this.records.values()) {
      if (!record.birthday) {
        continue;
      }

      const congratulationDate = this.congratulationDate(
        record.birthday,
        today,
      );
      const daysLeft = ChronoUnit.DAYS.between(today, congratulationDate);

      if (daysLeft >= 0 && daysLeft <= windowDays) {
        upcoming.push({
          name: record.name,
          congratulationDate: Birthday.format(congratulationDate),
        });
      }
    }

    return upcoming;
  }

  private congratulationDate(birthday: Birthday, today: LocalDate): LocalDate {
    let date = birthday.date.withYear(today.year());

    if (date.isBefore(today)) {
      date = birthday.date.withYear(today.year() + 1);
    }

    return this.isWeekend(date)
      ? date.with(TemporalAdjusters.next(DayOfWeek.MONDAY))
      : date;
  }

  private isWeekend(date: LocalDate): boolean {
    const dayOfWeek = date.dayOfWeek();

    return (
      dayOfWeek.equals(DayOfWeek.SATURDAY) || dayOfWeek.equals(DayOfWeek.SUNDAY)
    );
  }
}
