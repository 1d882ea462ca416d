/**
 * Base layout for the exporter's status pages.
 *
 * Uses Pico CSS for classless styling.
 */
import type { FC, PropsWithChildren } from "hono/jsx";

type BaseLayoutProps = PropsWithChildren<{
  title: string;
}>;

export const BaseLayout: FC<BaseLayoutProps> = ({ title, children }) => (
  <html lang="en" data-theme="dark">
    <head>
      <meta charset="utf-8" />
      <meta name="viewport" content="width=device-width, initial-scale=1" />
      <meta name="color-scheme" content="dark" />

      <title>{title}</title>

      {/* Pico CSS - Classless styling */}
      <link
        rel="stylesheet"
        href="https://cdn.jsdelivr.net/npm/@picocss/pico@2/css/pico.min.css"
      />
    </head>
    <body>
      <main class="container" style="padding-top: 2rem;">
        {children}
      </main>
    </body>
  </html>
);
