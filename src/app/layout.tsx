import { AI_DESCRIPTION, AI_NAME } from "@/features/theme/theme-config";
import type { Metadata } from "next";
import "./globals.css";

export const dynamic = "force-dynamic";

export const metadata: Metadata = {
  title: AI_NAME,
  description: AI_DESCRIPTION,
};

export default function RootLayout({
  children,
}: {
  children: React.ReactNode;
}) {
  return (
    <html lang="en" className="h-full w-full overflow-hidden text-sm">
      <body className="flex w-full h-full font-sans antialiased">
        <div className="flex w-full h-full overflow-y-auto bg-background">
          {children}
        </div>
      </body>
    </html>
  );
}
