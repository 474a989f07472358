export enum Sex {
  MALE = 'M',
  FEMALE = 'F',
}

export function isSex(value: string | null | undefined): value is Sex {
  return value === Sex.MALE || value === Sex.FEMALE;
}
