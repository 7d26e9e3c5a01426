import type { Config } from "tailwindcss";

const hsl = (name: string) => `hsl(var(--${name}) / <alpha-value>)`;

export default {
  darkMode: "class",
  content: {
    relative: true,
    files: ["./index.html", "./src/**/*.{ts,tsx}"],
  },
  theme: {
    extend: {
      colors: {
        background: hsl("background"),
        foreground: hsl("foreground"),
        card: hsl("card"),
        border: hsl("border"),
        input: hsl("input"),
        ring: hsl("ring"),
        primary: { DEFAULT: hsl("primary"), foreground: hsl("primary-foreground") },
        secondary: { DEFAULT: hsl("secondary"), foreground: hsl("secondary-foreground") },
        accent: hsl("accent"),
        muted: { foreground: hsl("muted-foreground") },
        destructive: { DEFAULT: hsl("destructive"), foreground: hsl("destructive-foreground") },
        income: hsl("income"),
        expense: hsl("expense"),
        danger: hsl("danger"),
        warning: hsl("warning"),
      },
      boxShadow: {
        soft: "0 1px 2px 0 rgb(0 0 0 / 0.12)",
        "soft-lg": "0 10px 30px -12px rgb(0 0 0 / 0.35)",
        lift: "0 12px 28px -10px rgb(0 0 0 / 0.45)",
      },
    },
  },
  plugins: [],
} satisfies Config;
