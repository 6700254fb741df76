import { isNil } from '@app/common/util/isNil';

export const throwIfIsNil =
  (createError: () => Error) =>
  <T>(value: T | null | undefined): T => {
    if (isNil(value)) {
      throw createError();
    }

    return value;
  };
