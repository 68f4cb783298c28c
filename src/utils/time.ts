export function toUnixSeconds(value: string | number): number {
  if (typeof value === 'number') {
    return Math.floor(value);
  }

  const asNumber = Number(value);
  if (value.trim() !== '' && !Number.isNaN(asNumber)) {
    return Math.floor(asNumber);
  }

  const parsed = Date.parse(value);
  if (Number.isNaN(parsed)) {
    throw new Error(`Unable to parse time value: ${value}`);
  }

  return Math.floor(parsed / 1000);
}

export function epochSecondsNow(): number {
  return Math.floor(Date.now() / 1000);
}
