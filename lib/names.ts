/**
 * Suffixes of the `Name` tags the stack puts on its resources.
 */
export const NAME_TAG_SUFFIXES = ['vpc', 'subnet-1', 'igw', 'rtb', 'sg', 'server'] as const;

export type NameTagSuffix = (typeof NAME_TAG_SUFFIXES)[number];

export const nameTag = (envPrefix: string, suffix: NameTagSuffix): string => `${envPrefix}-${suffix}`;

/**
 * Every `Name` tag value an environment's stack declares
 */
export const declaredNameTags = (envPrefix: string): string[] =>
  NAME_TAG_SUFFIXES.map(suffix => nameTag(envPrefix, suffix));
