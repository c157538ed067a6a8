interface AppHeaderProps {
  companyName: string;
}

export function AppHeader({ companyName }: AppHeaderProps) {
  return (
    <header className="border-b border-stone-200 bg-white/90 backdrop-blur sticky top-0 z-10">
      <div className="max-w-6xl mx-auto px-6 py-3 flex items-center justify-between gap-4">
        <div className="min-w-0">
          <p className="heading-kicker">Measurement sheet</p>
          <h1 className="text-lg font-semibold text-stone-900 truncate">{companyName}</h1>
        </div>
        <p className="text-xs text-stone-500 hidden sm:block">Gross and net slab areas, ready to print</p>
      </div>
    </header>
  );
}
