import type { Metadata } from "next";
import type { ReactNode } from "react";
import "./globals.css";

export const metadata: Metadata = {
  title: "Quicklook Analytics",
  description: "Upload a CSV and get a summary, charts and a preview in seconds.",
};

export default function RootLayout({ children }: { children: ReactNode }) {
  return (
    <html lang="en" suppressHydrationWarning>
      <body>
        <div className="shell">
          {/* Top gradient header */}
          <header className="topbar">
            <div className="topbar-inner">
              <div className="logo">📊</div>
              <div>
                <h1>Quicklook Analytics</h1>
                <p>Drop a CSV, see what is inside.</p>
              </div>
            </div>
          </header>

          <main className="content">{children}</main>
        </div>
      </body>
    </html>
  );
}
