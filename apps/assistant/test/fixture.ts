import { Clock, Instant, ZoneOffset } from '@js-joda/core';

// 01.01.2024 is a Monday
export const NEW_YEAR_CLOCK = Clock.fixed(
  Instant.parse('2024-01-01T09:00:00Z'),
  ZoneOffset.UTC,
);
