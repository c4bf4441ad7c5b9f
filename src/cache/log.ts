const TAG = "[lru2q]:";

export function tagged(message: string): string {
  return `${TAG} ${message}`;
}

export function debug(message: string): void {
  console.debug(
    `%c${TAG} %c${message}`,
    "color: lightgreen; font-weight: bold;",
    "font-style:italic;color:lightgrey"
  );
}
