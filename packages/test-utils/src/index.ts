export const PACKAGE_NAME = "@countdown/test-utils" as const;

export { FakeClock } from "./fake-clock.js";
