import { isDebug } from "../config.js";

export function logDebug(text: string | (() => string)) {
  if (!isDebug()) {
    return;
  }
  console.log(typeof text === "function" ? text() : text);
}
