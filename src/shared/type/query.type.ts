export type ReportQuery = {
    Querystring: { url?: string; ip?: string; atom?: string };
};
