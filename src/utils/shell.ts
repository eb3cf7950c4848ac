/** Заключает строку в одинарные кавычки для POSIX sh */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export function elevate(command: string): string {
  return `sudo -n sh -c ${shellQuote(command)}`;
}
