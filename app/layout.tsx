import type { Metadata, Viewport } from 'next';

export const metadata: Metadata = {
  title: 'Waypoint Editor',
  description: 'Edit glider waypoint files in SeeYou CUP and CSV formats'
};

export const viewport: Viewport = {
  width: 'device-width',
  initialScale: 1,
  themeColor: '#14305a'
};

export default function RootLayout({
  children
}: Readonly<{
  children: React.ReactNode;
}>) {
  return (
    <html lang="en">
      <body>{children}</body>
    </html>
  );
}
