// lib/styles.ts

import type { Orientation, Theme } from './types';

type Palette = {
  background: string;
  text: string;
  bar: string;
  negative: string;
  button: string;
  buttonBorder: string;
};

const PALETTES: Record<Theme, Palette> = {
  light: {
    background: '#f9f9f9',
    text: '#101010',
    bar: '#1a5fb4',
    negative: '#26a269',
    button: '#efefef',
    buttonBorder: '#101010',
  },
  dark: {
    background: '#151515',
    text: '#e0e0e0',
    bar: '#62a0ea',
    negative: '#8ff0a4',
    button: '#303030',
    buttonBorder: '#a0a0a0',
  },
};

// Vertical pages size by viewport height (phone held upright), horizontal by width
const SIZING: Record<Orientation, { table: string; font: string; small: string }> = {
  vertical: { table: 'height: 85vh;', font: '1.7vh', small: '1.3vh' },
  horizontal: { table: '', font: '1.5vw', small: '1.1vw' },
};

export function buildStyles(orientation: Orientation, theme: Theme): string {
  const c = PALETTES[theme];
  const s = SIZING[orientation];

  return `
body {
  background-color: ${c.background};
  color: ${c.text};
}
div.blocks {
  display: flex;
  gap: 2vw;
}
table.prices {
  ${s.table}
  border-spacing: 0px;
  font-size: ${s.font};
  white-space: nowrap;
  padding-bottom: 4px;
}
tr {
  padding: 0px;
  margin: 0px;
}
th, td {
  padding: 0px 0px 0px 2px;
  text-align: center;
}
td.bargraph {
  font-family: 'Courier New', monospace;
  text-align: left;
  color: ${c.bar};
  letter-spacing: 0px;
}
td.pricecol {
  text-align: right;
  padding-right: 2px;
}
tr.negative td.pricecol, tr.negative td.bargraph {
  color: ${c.negative};
}
p {
  font-size: ${s.small};
}
nav {
  display: flex;
  flex-wrap: wrap;
  gap: 4px;
}
a.button {
  font-size: ${s.font};
  font-weight: bold;
  text-decoration: none;
  color: ${c.text};
  background-color: ${c.button};
  padding: 2px 6px;
  border-right: 2px solid ${c.buttonBorder};
  border-bottom: 2px solid ${c.buttonBorder};
  text-align: center;
}
`;
}
