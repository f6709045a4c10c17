import type { ComponentType } from "react";

export interface NavLinkProps {
  href: string;
  className?: string;
  children: React.ReactNode;
}

export interface NavProps {
  Link?: ComponentType<NavLinkProps>;
}

const DefaultLink = ({ href, className, children }: NavLinkProps) => (
  <a href={href} className={className}>
    {children}
  </a>
);

export function Nav({ Link: LinkComponent = DefaultLink }: NavProps = {}) {
  return (
    <nav className="border-b border-gray-200 bg-white">
      <div className="mx-auto flex max-w-6xl items-center justify-between px-4 py-3">
        <LinkComponent href="/" className="text-lg font-bold text-gray-900">
          Trialscope
        </LinkComponent>
        <a
          href="https://clinicaltrials.gov/data-api/api"
          className="text-sm text-gray-600 hover:text-gray-900"
          rel="noreferrer"
          target="_blank"
        >
          Data: ClinicalTrials.gov
        </a>
      </div>
    </nav>
  );
}
