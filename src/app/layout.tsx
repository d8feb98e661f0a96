import type { Metadata } from "next";
import "./globals.css";

export const metadata: Metadata = {
  title: "Data Dashboard",
  description: "Interactive exploration of sample datasets and compound screening read-outs",
};

export default function RootLayout({
  children,
}: Readonly<{
  children: React.ReactNode;
}>) {
  return (
    <html lang="en">
      <body className="antialiased">
        {children}
      </body>
    </html>
  );
}
