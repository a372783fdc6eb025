export const INJECTION_TOKENS = {
  EMAIL_ADDRESS_REPOSITORY: Symbol('EMAIL_ADDRESS_REPOSITORY'),
} as const;
