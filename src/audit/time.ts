function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

// e.g. 20260131-093005, local time
export function formatTimestampForDir(d: Date): string {
  const date = `${d.getFullYear()}${pad2(d.getMonth() + 1)}${pad2(d.getDate())}`;
  const time = `${pad2(d.getHours())}${pad2(d.getMinutes())}${pad2(d.getSeconds())}`;
  return `${date}-${time}`;
}
