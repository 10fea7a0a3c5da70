export function makeFileNameValidator(accept: string[]) {
  const lowered = accept.map((a) => a.toLowerCase());
  return (fileName: string) => {
    const name = fileName.toLowerCase();
    return lowered.some((a) => name.endsWith(a));
  };
}

export const isCsvFileName = makeFileNameValidator([".csv"]);
