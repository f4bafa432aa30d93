/**
 * Catalog of supported macOS preferences
 *
 * Maps each `macos.<section>.<option>` in system.yaml onto a `defaults`
 * domain/key, its type tag, and the process that has to be restarted to pick
 * the value up.
 */

import type { MacosSection } from '../../config/types.js';
import type { DefaultsType, ScalarValue } from '../defaults/types.js';
import { booleanType, integerType, enumType } from '../defaults/tags.js';

export interface CatalogEntry {
  section: MacosSection;
  /** Option name in system.yaml */
  option: string;
  domain: string;
  key: string;
  type: DefaultsType<ScalarValue>;
  /** Process to restart after a change; omitted when a re-login is needed */
  restart?: string;
}

export const DOCK_ORIENTATIONS = ['left', 'bottom', 'right'] as const;
export const MOUSE_BUTTON_MODES = ['OneButton', 'TwoButton'] as const;

const dockOrientation = enumType('dock orientation', DOCK_ORIENTATIONS);
const mouseButtonMode = enumType('mouse button mode', MOUSE_BUTTON_MODES);

export const MACOS_SECTIONS: readonly MacosSection[] = [
  'dock',
  'mission-control',
  'safari',
  'system',
  'magic-mouse',
  'finder',
];

/**
 * Supported settings, in the order they are applied
 */
export const MACOS_CATALOG: readonly CatalogEntry[] = [
  // Dock
  { section: 'dock', option: 'orientation', domain: 'com.apple.dock', key: 'orientation', type: dockOrientation, restart: 'Dock' },
  { section: 'dock', option: 'autohide', domain: 'com.apple.dock', key: 'autohide', type: booleanType, restart: 'Dock' },
  { section: 'dock', option: 'icon-size', domain: 'com.apple.dock', key: 'tilesize', type: integerType, restart: 'Dock' },

  // Mission Control lives in the Dock process
  { section: 'mission-control', option: 'rearrange-spaces', domain: 'com.apple.dock', key: 'mru-spaces', type: booleanType, restart: 'Dock' },
  { section: 'mission-control', option: 'group-windows-by-app', domain: 'com.apple.dock', key: 'expose-group-apps', type: booleanType, restart: 'Dock' },

  // Safari
  { section: 'safari', option: 'show-full-url', domain: 'com.apple.Safari', key: 'ShowFullURLInSmartSearchField', type: booleanType, restart: 'Safari' },

  // System-wide
  { section: 'system', option: 'show-file-extensions', domain: 'NSGlobalDomain', key: 'AppleShowAllExtensions', type: booleanType, restart: 'Finder' },
  { section: 'system', option: 'natural-scrolling', domain: 'NSGlobalDomain', key: 'com.apple.swipescrolldirection', type: booleanType },

  // Magic Mouse
  { section: 'magic-mouse', option: 'secondary-click', domain: 'com.apple.driver.AppleBluetoothMultitouch.mouse', key: 'MouseButtonMode', type: mouseButtonMode },

  // Finder
  { section: 'finder', option: 'show-path-bar', domain: 'com.apple.finder', key: 'ShowPathbar', type: booleanType, restart: 'Finder' },
  { section: 'finder', option: 'show-hidden-files', domain: 'com.apple.finder', key: 'AppleShowAllFiles', type: booleanType, restart: 'Finder' },
];

/**
 * Look up a catalog entry by section and option name
 */
export function findCatalogEntry(section: MacosSection, option: string): CatalogEntry | undefined {
  return MACOS_CATALOG.find((entry) => entry.section === section && entry.option === option);
}

export function isMacosSection(value: string): value is MacosSection {
  return MACOS_SECTIONS.some((section) => section === value);
}
