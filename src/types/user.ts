export type UserAttributeValue = string | number | boolean | null;

export type UserAttributes = Record<string, UserAttributeValue>;

export type UserRecord = {
  id: string;
  name: string;
  email: string;
  // Only present once an update has supplied attributes.
  attributes?: UserAttributes;
};

/**
 * Partial update for a stored user. Keys left out (or set to `undefined`)
 * are not touched; supplied `attributes` keys are merged into the existing
 * ones.
 */
export type UserUpdate = {
  name?: string;
  email?: string;
  attributes?: UserAttributes;
};
