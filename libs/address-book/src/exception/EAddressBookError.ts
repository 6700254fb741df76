export enum EAddressBookError {
  VALIDATION = 'ValidationError',
  DUPLICATE_PHONE = 'DuplicatePhoneError',
  PHONE_NOT_FOUND = 'PhoneNotFoundError',
  NOT_FOUND = 'NotFoundError',
}
