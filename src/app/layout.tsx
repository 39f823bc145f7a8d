import type { Metadata } from "next";
import "./globals.css";

export const metadata: Metadata = {
  title: "World Telemetry Analytics",
  description: "Interactive analytics over synthetic game-world telemetry",
};

export default function RootLayout({ children }: { children: React.ReactNode }) {
  return (
    <html lang="en" className="dark">
      <body className="antialiased">{children}</body>
    </html>
  );
}
