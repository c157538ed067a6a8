import type { ReactNode } from "react";

interface PanelProps {
  children: ReactNode;
  className?: string;
  kicker?: string;
  title?: string;
  /** Right-aligned controls in the panel header */
  actions?: ReactNode;
}

export function Panel({ children, className = "", kicker, title, actions }: PanelProps) {
  return (
    <section className={`sheet-panel ${className}`}>
      {(kicker || title || actions) && (
        <header className="sheet-panel-header">
          <div>
            {kicker ? <p className="heading-kicker mb-1">{kicker}</p> : null}
            {title ? <h2 className="heading-section">{title}</h2> : null}
          </div>
          {actions ? <div className="flex flex-wrap gap-2">{actions}</div> : null}
        </header>
      )}
      <div>{children}</div>
    </section>
  );
}
