// Two leading digits are the province code, 01 to 52.
const postalCodeRegex = /^(0[1-9]|[1-4][0-9]|5[0-2])\d{3}$/;
// Information numbers are not accepted.
const phoneNumberRegex = /^[6-9]\d{8}$/;

export const validatePostalCode = (raw: string | null | undefined): boolean =>
  postalCodeRegex.test((raw ?? '').trim());

export const validatePhoneNumber = (raw: string | null | undefined): boolean =>
  phoneNumberRegex.test((raw ?? '').trim());
