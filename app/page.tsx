// app/page.tsx

import { COLUMN_KEYS, displayValues, tableLength } from '@/lib/table';
import type { BlockOrder, ColumnKey, NavLink, PriceTable } from '@/lib/types';

const CELL_CLASS: Partial<Record<ColumnKey, string>> = {
  price: 'pricecol',
  bar: 'bargraph',
};

export default function PricePage({
  blocks,
  blockOrder,
  links,
}: {
  blocks: PriceTable[];
  blockOrder: BlockOrder;
  links: NavLink[];
}) {
  // rtl puts the later block on the left
  const ordered = blockOrder === 'rtl' ? [...blocks].reverse() : blocks;

  return (
    <main>
      {ordered.length > 1 ? (
        <div className="blocks">
          {ordered.map((block, idx) => (
            <PriceBlockTable key={idx} table={block} />
          ))}
        </div>
      ) : (
        ordered.map((block, idx) => <PriceBlockTable key={idx} table={block} />)
      )}
      <nav>
        {links.map((link) => (
          <a key={link.href} href={link.href} className="button">
            {link.label}
          </a>
        ))}
      </nav>
    </main>
  );
}

function PriceBlockTable({ table }: { table: PriceTable }) {
  const rowCount = tableLength(table);
  const columns = COLUMN_KEYS.map((key) => ({
    key,
    header: table[key].header,
    values: displayValues(table[key]),
  }));
  const prices = table.price.values;

  return (
    <table className="prices">
      <thead>
        <tr>
          {columns.map((col) => (
            <th key={col.key}>{col.header}</th>
          ))}
        </tr>
      </thead>
      <tbody>
        {Array.from({ length: rowCount }, (_, i) => (
          <tr key={i} className={prices[i].startsWith('-') ? 'negative' : undefined}>
            {columns.map((col) => (
              <td key={col.key} className={CELL_CLASS[col.key]}>
                {col.values[i]}
              </td>
            ))}
          </tr>
        ))}
      </tbody>
    </table>
  );
}
