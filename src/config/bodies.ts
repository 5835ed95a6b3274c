export type BodyName =
  | 'Sun'
  | 'Mercury'
  | 'Venus'
  | 'Earth'
  | 'Mars'
  | 'Jupiter'
  | 'Saturn'
  | 'Uranus'
  | 'Neptune';

export type PlanetName = Exclude<BodyName, 'Sun'>;

export type IconStyle = 'ascii' | 'unicode';

/** Terminal foreground colors, as understood by Ink's `<Text color>`. */
export type TermColor =
  | 'yellow'
  | 'yellowBright'
  | 'magentaBright'
  | 'blueBright'
  | 'blue'
  | 'red'
  | 'redBright'
  | 'cyan'
  | 'gray';

export interface BodyConfig {
  name: BodyName;
  horizonsId: string;
  icons: Record<IconStyle, string>;
  color: TermColor;
  /** Nominal circular orbit radius; `null` for the Sun. */
  orbitAu: number | null;
}

export const BODY_NAMES: readonly BodyName[] = [
  'Sun',
  'Mercury',
  'Venus',
  'Earth',
  'Mars',
  'Jupiter',
  'Saturn',
  'Uranus',
  'Neptune'
];

export const PLANET_NAMES: readonly PlanetName[] = BODY_NAMES.filter(
  (name): name is PlanetName => name !== 'Sun'
);

export const BODIES: Record<BodyName, BodyConfig> = {
  Sun: {
    name: 'Sun',
    horizonsId: '10',
    icons: { ascii: '@', unicode: '☉' },
    color: 'yellow',
    orbitAu: null
  },
  Mercury: {
    name: 'Mercury',
    horizonsId: '199',
    icons: { ascii: 'm', unicode: '☿' },
    color: 'magentaBright',
    orbitAu: 0.387098
  },
  Venus: {
    name: 'Venus',
    horizonsId: '299',
    icons: { ascii: 'v', unicode: '♀' },
    color: 'yellowBright',
    orbitAu: 0.723332
  },
  Earth: {
    name: 'Earth',
    horizonsId: '399',
    icons: { ascii: 'E', unicode: '⊕' },
    color: 'blueBright',
    orbitAu: 1.0
  },
  Mars: {
    name: 'Mars',
    horizonsId: '499',
    icons: { ascii: 'M', unicode: '♂' },
    color: 'red',
    orbitAu: 1.523679
  },
  Jupiter: {
    name: 'Jupiter',
    horizonsId: '599',
    icons: { ascii: 'J', unicode: '♃' },
    color: 'redBright',
    orbitAu: 5.2038
  },
  Saturn: {
    name: 'Saturn',
    horizonsId: '699',
    icons: { ascii: 'S', unicode: '♄' },
    color: 'yellowBright',
    orbitAu: 9.53707
  },
  Uranus: {
    name: 'Uranus',
    horizonsId: '799',
    icons: { ascii: 'U', unicode: '♅' },
    color: 'cyan',
    orbitAu: 19.19126
  },
  Neptune: {
    name: 'Neptune',
    horizonsId: '899',
    icons: { ascii: 'N', unicode: '♆' },
    color: 'blue',
    orbitAu: 30.06896
  }
};

export interface FocusLevel {
  name: PlanetName;
  orbitAu: number;
}

// Innermost to outermost. Mercury and Venus are not fit targets.
export const FOCUS_LEVELS: readonly FocusLevel[] = [
  { name: 'Earth', orbitAu: 1.0 },
  { name: 'Mars', orbitAu: 1.523679 },
  { name: 'Jupiter', orbitAu: 5.2038 },
  { name: 'Saturn', orbitAu: 9.53707 },
  { name: 'Uranus', orbitAu: 19.19126 },
  { name: 'Neptune', orbitAu: 30.06896 }
];

export const DEFAULT_FOCUS_INDEX = FOCUS_LEVELS.length - 1;

export function iconFor(name: BodyName, style: IconStyle): string {
  return BODIES[name].icons[style];
}

export function isBodyName(value: string): value is BodyName {
  return BODY_NAMES.some((name) => name === value);
}
