// lib/types.ts

export type Resolution = 'hour' | 'quarter';

export type PriceRecord = {
  start: Date;    // slot start
  price: number;  // snt/kWh incl. VAT
};

// API payload (porssisahko.net latest-prices.json)
export type PricePayload = {
  prices: Array<{
    price: number;
    startDate: string;
    endDate?: string;
  }>;
};

export type ColumnKey = 'date' | 'hour' | 'price' | 'bar';

export type DisplayColumn = {
  header: string;
  values: string[];
  suppressRepeat: boolean;  // blank a value equal to the previous row's
  repeatKeys?: number[];    // compared instead of the values when present
};

export type PriceTable = Record<ColumnKey, DisplayColumn>;

export type Orientation = 'vertical' | 'horizontal';

export type Theme = 'light' | 'dark';

export type BlockOrder = 'ltr' | 'rtl';

export type PageVariant = {
  orientation: Orientation;
  theme: Theme;
  resolution: Resolution;
};

export type NavLink = {
  href: string;
  label: string;
};
