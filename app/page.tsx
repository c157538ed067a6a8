import { AppHeader } from "@/components/AppHeader";
import { Footer } from "@/components/Footer";
import { MeasurementWorkspace } from "@/components/MeasurementWorkspace";
import { getCompanyProfile, getDefaultThemeId } from "@/lib/env";

export const dynamic = "force-dynamic";

export default function Home() {
  const company = getCompanyProfile();
  return (
    <>
      <AppHeader companyName={company.name} />
      <MeasurementWorkspace defaultThemeId={getDefaultThemeId()} />
      <Footer addressLines={company.addressLines} />
    </>
  );
}
