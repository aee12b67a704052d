import { load } from "cheerio";

export interface LoginForm {
  formBuildId: string;
  formId: string;
  actionUrl: string;
}

/**
 * Finds the portal's login form: the form that carries a password field and a
 * `form_build_id` token. Search and newsletter forms on the same page carry a
 * token too, so the password field is what tells them apart.
 */
export function findLoginForm(html: string, pageUrl: string): LoginForm | undefined {
  const $ = load(html);

  const form = $("form")
    .filter((_, element) => $(element).find("input[name='pass'], input[type='password']").length > 0)
    .first();
  if (form.length === 0) {
    return undefined;
  }

  const formBuildId = form.find("input[name='form_build_id']").attr("value");
  if (!formBuildId) {
    return undefined;
  }

  const action = form.attr("action");
  return {
    formBuildId,
    formId: form.find("input[name='form_id']").attr("value") || "user_login",
    actionUrl: action ? new URL(action, pageUrl).toString() : pageUrl,
  };
}
