import { formatAreaWithUnit } from "@/lib/format";
import type { ReportTotals } from "@/lib/measurement/schema";

export function TotalsStrip({ totals }: { totals: ReportTotals }) {
  const items = [
    { label: "Slabs", value: String(totals.slabCount) },
    { label: "Total gross area", value: formatAreaWithUnit(totals.totalGrossArea) },
    { label: "Total net area", value: formatAreaWithUnit(totals.totalNetArea) },
  ];
  return (
    <dl className="grid grid-cols-3 gap-3">
      {items.map((item) => (
        <div key={item.label} className="border border-stone-200 bg-white p-3">
          <dt className="heading-kicker">{item.label}</dt>
          <dd className="text-xl font-semibold text-stone-900 tabular-nums">{item.value}</dd>
        </div>
      ))}
    </dl>
  );
}
