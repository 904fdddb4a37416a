// src/app/layout.tsx
import type { Metadata } from "next";
import type { ReactNode } from "react";
import "./globals.css";

export const metadata: Metadata = {
  title: "CSV Catalyst",
  description: "Upload a CSV, get it cleaned, profiled and charted.",
};

export default function RootLayout({ children }: { children: ReactNode }) {
  return (
    <html lang="en" suppressHydrationWarning>
      <body className="antialiased">
        <div className="min-h-dvh bg-surface text-[15px] text-ink">
          <header className="border-b-4 border-ink bg-neon">
            <div className="mx-auto max-w-6xl px-6 py-6 flex items-center gap-3">
              <div className="h-9 w-9 border-2 border-ink bg-white flex items-center justify-center shadow-brutal">
                <span className="text-lg">📊</span>
              </div>
              <div>
                <h1 className="text-xl font-bold tracking-tight">CSV Catalyst</h1>
                <p className="text-xs/5">Clean score, standard charts and AI deep dives for any table</p>
              </div>
            </div>
          </header>

          <main className="mx-auto max-w-6xl p-6">{children}</main>
        </div>
      </body>
    </html>
  );
}
