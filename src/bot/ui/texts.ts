import type { LedgerFailureReason } from "../../core/errors.js";

export const BUTTONS = {
  order: "📝 Заказать разработку",
  referral: "🤝 Реферальная программа",
  help: "❓ Как это работает",
  portfolio: "🗂 Портфолио",
  team: "👥 Вступить в команду",
  consultation: "💬 Консультация"
} as const;

export const TEXTS = {
  start:
    "Привет! Мы разрабатываем Telegram-ботов и мини-приложения под ключ.\n\n" +
    "Оставьте заявку на разработку или приглашайте клиентов и получайте 25% от суммы их заказов.",
  help:
    "Как это работает:\n\n" +
    "- вы оставляете заявку с описанием проекта\n" +
    "- менеджер оценивает её и называет итоговую стоимость\n" +
    "- после оплаты мы приступаем к работе\n\n" +
    "Реферальная программа: 25% от каждого оплаченного заказа приглашённого клиента.",
  referralLinked: "🤝 Вы перешли по реферальной ссылке. Добро пожаловать!",
  askOrderType: "Что нужно разработать?",
  askProjectName: "Как называется проект?",
  askFunctionality: "Опишите функциональность: что должен уметь бот или приложение?",
  askDeadlines: "Какие сроки?",
  askBudget: "Какой бюджет?",
  orderCreated: "✅ Заявка отправлена! Менеджер свяжется с вами после оценки.",
  orderCancelled: "Заявка отменена.",
  referralWelcome:
    "🤝 <b>Реферальная программа</b>\n\n" +
    "Приглашайте клиентов по своей ссылке и получайте <b>25%</b> от суммы каждого оплаченного заказа.",
  noStats: "Вы ещё не участвуете в реферальной программе.",
  noEarnings: "Начислений пока нет.",
  askPayoutMethod: "Выберите способ получения выплат:",
  askCardNumber: "Введите номер карты (16 цифр):",
  askSbpPhone: "Введите номер телефона для СБП в формате +7XXXXXXXXXX:",
  askFullName: "Введите ФИО получателя полностью:",
  invalidCard: "❌ Неверный формат номера карты. Попробуйте ещё раз.",
  invalidPhone: "❌ Неверный формат номера телефона. Попробуйте ещё раз.",
  invalidFullName: "❌ Введите полное ФИО (Фамилия Имя Отчество).",
  payoutProfileSaved: "✅ Данные для выплат сохранены.",
  payoutDetailsMissing: "❌ Сначала настройте данные для выплат.",
  payoutRequested: "✅ Запрос на выплату создан. Администратор обработает его в ближайшее время.",
  askTeamFullName: "👥 <b>Анкета в команду</b>\n\nШаг 1 из 7. Как вас зовут (ФИО)?",
  askTeamAge: "Шаг 2 из 7. Сколько вам полных лет?",
  askTeamExperience: "Шаг 3 из 7. Расскажите о своём опыте в разработке:",
  askTeamStack: "Шаг 4 из 7. С какими технологиями вы работаете?",
  askTeamAbout: "Шаг 5 из 7. Пара слов о себе:",
  askTeamMotivation: "Шаг 6 из 7. Почему вы хотите работать с нами?",
  askTeamRole: "Шаг 7 из 7. На какую роль претендуете (backend, frontend, дизайн, QA, менеджмент)?",
  teamApplicationSent: "✅ Анкета отправлена! Мы рассмотрим её и свяжемся с вами.",
  askQuestion: "💬 <b>Консультация</b>\n\nОпишите ваш вопрос подробно:",
  invalidQuestion: "❌ Вопрос должен быть непустым и не длиннее 3000 символов.",
  questionSent: "✅ Вопрос отправлен! Ответ придёт в этот чат.",
  noPortfolio: "Портфолио пока пустое.",
  notAdmin: "Недостаточно прав.",
  adminMenu: "🛠 Панель администратора",
  nothingHere: "Пусто.",
  askPrice: "Введите итоговую стоимость заказа (например, 40000):",
  invalidPrice: "❌ Некорректная сумма. Введите положительное число.",
  askPriceNotes: "Комментарий для клиента (или «-», чтобы пропустить):",
  invalidPriceNotes: "❌ Комментарий должен быть не длиннее 1000 символов. Введите его ещё раз или «-»:",
  askRejectReason: "❌ Укажите причину отклонения выплаты:",
  askConsultationAnswer: "✉️ Введите ответ пользователю:",
  invalidConsultationAnswer: "❌ Ответ должен быть непустым и не длиннее 3000 символов. Введите его ещё раз:",
  consultationAnswered: "✅ Ответ отправлен пользователю.",
  askProjectTitle: "🗂 <b>Новый проект</b>\n\nНазвание проекта:",
  askProjectDescription: "Краткое описание:",
  askProjectDetails: "Подробности (или «-»):",
  askProjectCost: "Стоимость (например, 60000):",
  askProjectTechnologies: "Технологии (или «-»):",
  askProjectDuration: "Срок разработки (или «-»):",
  askProjectVideo: "Ссылка на видео (или «-»):",
  askProjectBotUrl: "Ссылка на бота (или «-»):",
  invalidUrl: "❌ Нужна ссылка вида https://…",
  addProject: "➕ Добавить проект",
  genericError: "Произошла ошибка. Действие не выполнено, попробуйте ещё раз."
} as const;

export function belowMinimumText(minAmount: string): string {
  return `❌ Минимальная сумма для вывода: ${minAmount}`;
}

const FAILURE_TEXTS: Record<LedgerFailureReason, string> = {
  NOT_FOUND: "Запись не найдена.",
  INVALID_TRANSITION: "Действие недоступно в текущем статусе.",
  INSUFFICIENT_BALANCE: "Недостаточно средств на балансе.",
  INVALID_AMOUNT: "Некорректная сумма.",
  UNKNOWN_CODE: "Реферальный код не найден.",
  SELF_REFERRAL: "Нельзя перейти по собственной реферальной ссылке.",
  ALREADY_REFERRED: "Вы уже привязаны к другому партнёру.",
  CIRCULAR_REFERRAL: "Нельзя стать рефералом собственного реферала."
};

export function failureText(reason: LedgerFailureReason): string {
  return `❌ ${FAILURE_TEXTS[reason]}`;
}
