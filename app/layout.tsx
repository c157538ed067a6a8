import type { Metadata } from "next";
import "./globals.css";

export const metadata: Metadata = {
  title: {
    default: "Slab Measurement Sheet",
    template: "%s | Slab Measurement Sheet",
  },
  description: "Paste slab measurements, review gross and net areas, and print the inspection report as PDF or XLSX.",
  applicationName: "Slab Measurement Sheet",
};

export default function RootLayout({
  children,
}: Readonly<{
  children: React.ReactNode;
}>) {
  return (
    <html lang="en" suppressHydrationWarning>
      <body className="font-sans antialiased min-h-screen bg-stone-100 text-stone-900">{children}</body>
    </html>
  );
}
