/**
 * Name normalization for CloudFormation logical IDs
 */

// Anything that is not a letter or a digit, underscore included
const SEPARATOR = /[^\p{L}\p{N}]+/u;

function capitalize(word: string): string {
  const [first, ...rest] = word;
  return first.toUpperCase() + rest.join('');
}

/**
 * Remove non-alphanumeric characters, upper-casing the character that
 * follows each removed run. Leading and trailing runs are just dropped.
 *
 * @example
 * toLogicalId("my_subnet_in_eu-west-1a!"); // "mySubnetInEuWest1a"
 */
export function toLogicalId(name: string): string {
  const words = name.split(SEPARATOR).filter((word) => word.length > 0);
  return words.map((word, index) => (index === 0 ? word : capitalize(word))).join('');
}
