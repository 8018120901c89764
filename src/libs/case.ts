// src/libs/case.ts
// Name helpers shared by the quickstart and the client token keys.

/** "My App" -> "my_app" */
export function toSnakeCase(value: string): string {
  return value.replace(/[^a-zA-Z0-9]/g, "_").toLowerCase();
}

/** "My App" -> "my-app" */
export function toKebabCase(value: string): string {
  return value.replace(/[^a-zA-Z0-9]/g, "-").toLowerCase();
}

/** "user_settings" -> "User Settings" */
export function toTitleCase(value: string): string {
  return value
    .replace(/[_-]/g, " ")
    .split(" ")
    .map((word) => (word.charAt(0).toUpperCase() + word.slice(1).toLowerCase()))
    .join(" ");
}
