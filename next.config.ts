import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  // Report rendering runs in the Node runtime; keep the native and CommonJS renderers out of the bundle.
  serverExternalPackages: ["sharp", "exceljs", "jspdf", "jspdf-autotable"],
};

export default nextConfig;
