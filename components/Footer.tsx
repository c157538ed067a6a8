export function Footer({ addressLines = [] }: { addressLines?: string[] }) {
  return (
    <footer className="border-t border-stone-200 mt-12">
      <div className="max-w-6xl mx-auto px-6 py-6 text-xs text-stone-500 space-y-1">
        {addressLines.map((line) => (
          <p key={line}>{line}</p>
        ))}
      </div>
    </footer>
  );
}
