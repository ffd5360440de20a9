import { lazy, Suspense } from "react";
import { createBrowserRouter, RouterProvider, Navigate } from "react-router-dom";
import { Loader2 } from "lucide-react";
import { Layout } from "@/components/layout/Layout";
import { AppLandingPage } from "@/components/panels/AppLandingPage";

// Lazy-loaded tool views (code-split into separate chunks)
const RuleGeneratorView = lazy(() => import("@/components/tools/RuleGeneratorView").then(m => ({ default: m.RuleGeneratorView })));
const NutritionGeneratorView = lazy(() => import("@/components/tools/NutritionGeneratorView").then(m => ({ default: m.NutritionGeneratorView })));
const PayloadEditorView = lazy(() => import("@/components/tools/PayloadEditorView").then(m => ({ default: m.PayloadEditorView })));
const RangeCalculatorView = lazy(() => import("@/components/tools/RangeCalculatorView").then(m => ({ default: m.RangeCalculatorView })));

function ViewLoading() {
  return (
    <div className="flex flex-1 items-center justify-center">
      <Loader2 className="h-6 w-6 animate-spin text-muted-foreground" />
    </div>
  );
}

function LazyRoute({ children }: { children: React.ReactNode }) {
  return <Suspense fallback={<ViewLoading />}>{children}</Suspense>;
}

const router = createBrowserRouter([
  {
    element: <Layout />,
    children: [
      { path: "/", element: <AppLandingPage /> },
      { path: "/generate", element: <LazyRoute><RuleGeneratorView /></LazyRoute> },
      { path: "/nutrition", element: <LazyRoute><NutritionGeneratorView /></LazyRoute> },
      { path: "/edit", element: <LazyRoute><PayloadEditorView /></LazyRoute> },
      { path: "/ranges", element: <LazyRoute><RangeCalculatorView /></LazyRoute> },
      { path: "*", element: <Navigate to="/" replace /> },
    ],
  },
]);

export default function App() {
  return <RouterProvider router={router} />;
}
