/**
 * Keys that never count as an answer to "press any key": modifiers, lock
 * keys, and browser/media/launch keys.
 */
export const IGNORED_KEYS: ReadonlySet<string> = new Set([
  "shift",
  "ctrl",
  "control",
  "alt",
  "pause",
  "capslock",
  "print",
  "printscreen",
  "lwin",
  "rwin",
  "meta",
  "menu",
  "numlock",
  "scrolllock",
  "browserback",
  "browserforward",
  "browserrefresh",
  "browserstop",
  "browsersearch",
  "browserfavorites",
  "browserhome",
  "volumemute",
  "volumedown",
  "volumeup",
  "medianext",
  "mediaprevious",
  "mediastop",
  "mediaplay",
  "launchmail",
  "launchmediaselect",
  "launchapp1",
  "launchapp2",
]);

/** Whether a key press is real input rather than a modifier or media key. */
export function isInputKey(name: string): boolean {
  return name !== "" && !IGNORED_KEYS.has(name.toLowerCase());
}
