export type OmittableString =
  | string
  | {
      data: string;
      omittedLength: number;
    };

export function stringToOmitted(str: string, lengthLimit: number): OmittableString {
  if (str.length <= lengthLimit) return str;

  const omitted = str.length - lengthLimit;
  return {
    data: str.slice(0, lengthLimit),
    omittedLength: omitted
  };
}

/**
 * A note of how much was cut off follows the kept part.
 */
export function renderOmittableString(omittableString: OmittableString) {
  if (typeof omittableString === "string") return omittableString;
  return `${omittableString.data}... (${omittableString.omittedLength} characters omitted)`;
}

export function prependOmittableString(str: string, omittableString: OmittableString, trim = false): OmittableString {
  // eslint-disable-next-line @typescript-eslint/no-shadow
  const trimString = (str: string) => (trim ? str.trim() : str);
  return typeof omittableString === "string"
    ? trimString(str + omittableString)
    : {
        data: trimString(str + omittableString.data),
        omittedLength: omittableString.omittedLength
      };
}
