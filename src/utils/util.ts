// "marketplace.products" -> { db: "marketplace", collection: "products" }
export const parseNamespace = (namespace: string): { db: string; collection: string } => {
  const dot = namespace.indexOf(".");
  if (dot <= 0 || dot === namespace.length - 1) {
    throw new Error(`invalid namespace: ${namespace}`);
  }
  return { db: namespace.slice(0, dot), collection: namespace.slice(dot + 1) };
};

export const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));
