import type { Config } from "tailwindcss";

export default {
  content: ["./index.html", "./src/**/*.{ts,tsx}"],
  theme: {
    extend: {
      colors: {
        bg: {
          primary: "#0f172a",
          secondary: "#1e293b",
          tertiary: "#334155",
        },
        text: {
          primary: "#f1f5f9",
          secondary: "#cbd5e1",
          muted: "#64748b",
        },
        accent: {
          DEFAULT: "#38bdf8",
          hover: "#0ea5e9",
        },
        danger: "#ef4444",
      },
    },
  },
  plugins: [],
} satisfies Config;
