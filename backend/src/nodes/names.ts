import { customAlphabet } from "nanoid";

const SUFFIX_ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz";
const randomSuffix = customAlphabet(SUFFIX_ALPHABET, 4);

export const DISPLAY_NAME_PATTERN = /^.+\.cb-[A-Za-z]{4}$/;

export function generateDisplayName(projectName: string, isTaken: (name: string) => boolean, suffix: () => string = randomSuffix): string {
  for (;;) {
    const candidate = `${projectName}.cb-${suffix()}`;
    if (!isTaken(candidate)) return candidate;
  }
}
