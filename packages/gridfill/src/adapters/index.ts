export type { BrowserHandle, DomProbe, DomWriter } from './types';
export { PlaywrightBrowserHandle, toPlaywrightSelector } from './playwright';
