export interface UpcomingBirthday {
  name: string;
  /** DD.MM.YYYY, moved to Monday when the birthday falls on a weekend */
  congratulationDate: string;
}
