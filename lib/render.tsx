// lib/render.tsx

import { renderToStaticMarkup } from 'react-dom/server';
import RootLayout from '@/app/layout';
import PricePage from '@/app/page';
import { buildStyles } from './styles';
import { splitTable, tableLength } from './table';
import { navLinks } from './variants';
import type { BlockOrder, PageVariant, PriceTable } from './types';

export type RenderInput = {
  table: PriceTable;
  variant: PageVariant;
  splitThreshold: number;
  blockOrder: BlockOrder;
};

export function tableBlocks(
  table: PriceTable,
  variant: PageVariant,
  splitThreshold: number
): PriceTable[] {
  const wide = tableLength(table) > splitThreshold;
  return variant.orientation === 'horizontal' && wide ? splitTable(table) : [table];
}

export function renderPage(input: RenderInput): string {
  const { table, variant, splitThreshold, blockOrder } = input;

  const markup = renderToStaticMarkup(
    <RootLayout css={buildStyles(variant.orientation, variant.theme)}>
      <PricePage
        blocks={tableBlocks(table, variant, splitThreshold)}
        blockOrder={blockOrder}
        links={navLinks(variant)}
      />
    </RootLayout>
  );

  return `<!doctype html>\n${markup}\n`;
}
