/**
 * A legacy URL that answers with a 301.
 * `from` is a route path with :name parameters, `to` a target with
 * {name} or positional {0} placeholders.
 */
export type RedirectRule = {
    from: string;
    to: string;
};
