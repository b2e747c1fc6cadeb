const ADMIN_IDS_PATTERN = /^[0-9]+(?:,[0-9]+)*$/;

export const ADMIN_IDS_HINT =
  'ADMIN_IDS must be comma-separated numeric IDs (e.g. 123456789,987654321).';

export const normalizeAdminIds = (value: string): string => value.replace(/\s+/g, '');

export const isValidAdminIds = (value: string): boolean =>
  ADMIN_IDS_PATTERN.test(normalizeAdminIds(value));

