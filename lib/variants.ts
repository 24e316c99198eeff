// lib/variants.ts

import type { NavLink, Orientation, PageVariant, Resolution, Theme } from './types';

const ORIENTATIONS: Orientation[] = ['vertical', 'horizontal'];
const THEMES: Theme[] = ['light', 'dark'];
const RESOLUTIONS: Resolution[] = ['hour', 'quarter'];

export const ALL_VARIANTS: PageVariant[] = RESOLUTIONS.flatMap((resolution) =>
  ORIENTATIONS.flatMap((orientation) =>
    THEMES.map((theme) => ({ orientation, theme, resolution }))
  )
);

// spot-hintataulukko.html is the vertical, light, hourly page
export function pageFileName(variant: PageVariant): string {
  const parts = ['spot-hintataulukko'];
  if (variant.orientation === 'horizontal') parts.push('vaaka');
  if (variant.theme === 'dark') parts.push('tumma');
  if (variant.resolution === 'quarter') parts.push('15min');
  return `${parts.join('-')}.html`;
}

// Refresh first, then one link per dimension to the page that differs only in it
export function navLinks(variant: PageVariant): NavLink[] {
  const other = (patch: Partial<PageVariant>): string => pageFileName({ ...variant, ...patch });

  return [
    { href: pageFileName(variant), label: 'Päivitä' },
    variant.orientation === 'vertical'
      ? { href: other({ orientation: 'horizontal' }), label: 'Vaakanäkymä' }
      : { href: other({ orientation: 'vertical' }), label: 'Pystynäkymä' },
    variant.theme === 'light'
      ? { href: other({ theme: 'dark' }), label: 'Tumma teema' }
      : { href: other({ theme: 'light' }), label: 'Vaalea teema' },
    variant.resolution === 'hour'
      ? { href: other({ resolution: 'quarter' }), label: '15 min hinnat' }
      : { href: other({ resolution: 'hour' }), label: 'Tuntihinnat' },
  ];
}
