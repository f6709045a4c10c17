import type { Metadata } from "next";
import Link from "next/link";
import { Nav, type NavLinkProps } from "@trialscope/ui";
import "./globals.css";

export const metadata: Metadata = {
  title: "Trialscope",
  description: "Clinical trial landscape by condition",
};

function NavLink({ href, className, children }: NavLinkProps) {
  return (
    <Link href={href} className={className}>
      {children}
    </Link>
  );
}

export default function RootLayout({
  children,
}: Readonly<{
  children: React.ReactNode;
}>) {
  return (
    <html lang="en">
      <body className="antialiased">
        <Nav Link={NavLink} />
        {children}
      </body>
    </html>
  );
}
