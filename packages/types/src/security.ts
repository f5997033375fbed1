export type HttpSecurityScheme = {
  type: "http";
  scheme: "bearer" | "basic";
  bearerFormat?: string;
  description?: string;
};

export type ApiKeySecurityScheme = {
  type: "apiKey";
  in: "header" | "query";
  name: string;
  description?: string;
};

export type SecuritySchemeDefinition = HttpSecurityScheme | ApiKeySecurityScheme;
