// app/layout.tsx

import type { ReactNode } from 'react';

export const metadata = {
  title: 'Sähkön hinta nyt',
  description:
    'Sähkön spot-hinta nykyhetkestä eteenpäin yksinkertaisessa taulukossa ilman mainoksia ja muuta tauhkaa.',
};

export default function RootLayout({
  css,
  children,
}: {
  css: string;
  children: ReactNode;
}) {
  return (
    <html lang="fi">
      <head>
        <meta charSet="utf-8" />
        <meta name="viewport" content="height=device-height, initial-scale=1" />
        <title>{metadata.title}</title>
        <meta name="description" content={metadata.description} />
        <style dangerouslySetInnerHTML={{ __html: css }} />
      </head>
      <body>{children}</body>
    </html>
  );
}
