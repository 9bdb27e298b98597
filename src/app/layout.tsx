import "./globals.css";

import type { Metadata } from "next";

export const metadata: Metadata = {
  title: "Service Assistant",
  description: "Device diagnostics, documentation and service visit booking.",
};

export default function RootLayout({
  children,
}: Readonly<{
  children: React.ReactNode;
}>) {
  return (
    <html lang="en">
      <body>{children}</body>
    </html>
  );
}
