import type { Config } from "tailwindcss";

const config: Config = {
  content: ["./src/**/*.{ts,tsx}"],
  theme: {
    extend: {
      colors: {
        ink: "#1E1E1E",
        neon: "#39FF14",
        surface: "#f0f0f0",
      },
      boxShadow: {
        brutal: "3px 3px 0px #1E1E1E",
      },
    },
  },
  plugins: [],
};

export default config;
